import { describe, it, expect } from "vitest";
import { knownHostName, removeKnownHost, removeSshConfigEntry, renderSshConfigEntry, upsertSshConfigEntry } from "./ssh-config.js";

const config = ["Host gpu", "     HostName a.example.com", "     Port 20022", "", "Host other", "     HostName b.example.com", ""].join("\n");

describe("renderSshConfigEntry", () => {
  it("renders a blank-line separated block", () => {
    expect(renderSshConfigEntry("gpu", "vm.example.com", 20022)).toBe(
      "\nHost gpu\n     StrictHostKeyChecking no\n     HostName vm.example.com\n     ForwardX11 yes\n     Port 20022\n",
    );
  });
});

describe("removeSshConfigEntry", () => {
  it("removes the block up to the next Host line", () => {
    expect(removeSshConfigEntry(config, "gpu")).toBe("Host other\n     HostName b.example.com\n");
  });

  it("removes a trailing block", () => {
    expect(removeSshConfigEntry(config, "other")).toBe("Host gpu\n     HostName a.example.com\n     Port 20022\n");
  });

  it("does not match aliases that only share a prefix", () => {
    expect(removeSshConfigEntry(config, "gp")).toBe(config);
  });

  it("leaves HostName lines alone", () => {
    expect(removeSshConfigEntry("HostName x\nHost y\n  Port 1\n", "x")).toBe("HostName x\nHost y\n  Port 1\n");
  });
});

describe("upsertSshConfigEntry", () => {
  it("replaces an existing entry", () => {
    const updated = upsertSshConfigEntry(config, "gpu", "new.example.com", 22);
    expect(updated).toBe(
      "Host other\n     HostName b.example.com\n" +
        "\nHost gpu\n     StrictHostKeyChecking no\n     HostName new.example.com\n     ForwardX11 yes\n     Port 22\n",
    );
  });

  it("adds a newline before appending to a file without one", () => {
    expect(upsertSshConfigEntry("Host a", "b", "h", 1)).toBe(
      "Host a\n\nHost b\n     StrictHostKeyChecking no\n     HostName h\n     ForwardX11 yes\n     Port 1\n",
    );
  });
});

describe("removeKnownHost", () => {
  it("drops lines for the host, including comma-separated entries", () => {
    const hosts = ["vm.example.com ssh-ed25519 AAAA1", "vm.example.com,10.0.0.4 ecdsa AAAA2", "other.example.com ssh-rsa AAAA3", ""].join("\n");
    expect(removeKnownHost(hosts, "vm.example.com")).toBe("other.example.com ssh-rsa AAAA3\n");
  });

  it("drops entries recorded with a non-default port", () => {
    const hosts = [
      "[vm.example.com]:20022 ssh-ed25519 AAAA1",
      "vm.example.com ssh-ed25519 AAAA2",
      "[other.example.com]:20022 ssh-ed25519 AAAA3",
      "",
    ].join("\n");
    expect(removeKnownHost(hosts, "vm.example.com")).toBe("[other.example.com]:20022 ssh-ed25519 AAAA3\n");
  });
});

describe("knownHostName", () => {
  it("strips the bracketed port form", () => {
    expect(knownHostName("[vm.example.com]:20022")).toBe("vm.example.com");
    expect(knownHostName("vm.example.com")).toBe("vm.example.com");
    expect(knownHostName("[vm.example.com]")).toBe("[vm.example.com]");
  });
});
