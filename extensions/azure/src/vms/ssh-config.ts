/**
 * Text transforms for ~/.ssh/config and ~/.ssh/known_hosts.
 *
 * An ssh config entry spans from its `Host <alias>` line up to the next
 * `Host` line.
 */

function hostAliases(line: string): string[] | undefined {
  const [keyword, ...aliases] = line.trim().split(/\s+/);
  return keyword?.toLowerCase() === "host" ? aliases : undefined;
}

export function renderSshConfigEntry(alias: string, hostName: string, port: number): string {
  return [
    "",
    `Host ${alias}`,
    "     StrictHostKeyChecking no",
    `     HostName ${hostName}`,
    "     ForwardX11 yes",
    `     Port ${port}`,
    "",
  ].join("\n");
}

/** Drop every entry whose `Host` line names `alias`. */
export function removeSshConfigEntry(config: string, alias: string): string {
  const kept: string[] = [];
  let skipping = false;
  for (const line of config.split("\n")) {
    const aliases = hostAliases(line);
    if (aliases) skipping = aliases.includes(alias);
    if (!skipping) kept.push(line);
  }
  return kept.join("\n");
}

export function upsertSshConfigEntry(config: string, alias: string, hostName: string, port: number): string {
  const rest = removeSshConfigEntry(config, alias);
  const separator = rest.length === 0 || rest.endsWith("\n") ? "" : "\n";
  return `${rest}${separator}${renderSshConfigEntry(alias, hostName, port)}`;
}

/** `[host]:port` as ssh records non-default ports, reduced to `host`. */
export function knownHostName(field: string): string {
  const bracketed = /^\[([^\]]+)\]:\d+$/.exec(field);
  return bracketed?.[1] ?? field;
}

/** Drop known_hosts lines whose host field lists `host` on any port. */
export function removeKnownHost(knownHosts: string, host: string): string {
  return knownHosts
    .split("\n")
    .filter((line) => {
      const hosts = line.trim().split(/\s+/)[0] ?? "";
      return !hosts.split(",").some((field) => knownHostName(field) === host);
    })
    .join("\n");
}
