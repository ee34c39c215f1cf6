/**
 * Kubernetes types: the parts of `kubectl get -o json` output the
 * controller reads, as TypeBox schemas.
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigurationError } from "@cirrus/core";

/* ---------- Schemas ---------- */

const metadataSchema = Type.Object({
  name: Type.String(),
  namespace: Type.Optional(Type.String()),
  labels: Type.Optional(Type.Record(Type.String(), Type.String())),
  creationTimestamp: Type.Optional(Type.String()),
});

export const secretSchema = Type.Object({
  metadata: metadataSchema,
  type: Type.Optional(Type.String()),
  data: Type.Optional(Type.Record(Type.String(), Type.String())),
});

const loadBalancerIngressSchema = Type.Object({
  ip: Type.Optional(Type.String()),
  hostname: Type.Optional(Type.String()),
});

export const serviceSchema = Type.Object({
  metadata: metadataSchema,
  spec: Type.Optional(
    Type.Object({
      type: Type.Optional(Type.String()),
      clusterIP: Type.Optional(Type.String()),
    }),
  ),
  status: Type.Optional(
    Type.Object({
      loadBalancer: Type.Optional(Type.Object({ ingress: Type.Optional(Type.Array(loadBalancerIngressSchema)) })),
    }),
  ),
});

export const deploymentSchema = Type.Object({
  metadata: metadataSchema,
  spec: Type.Optional(Type.Object({ replicas: Type.Optional(Type.Number()) })),
  status: Type.Optional(
    Type.Object({
      replicas: Type.Optional(Type.Number()),
      readyReplicas: Type.Optional(Type.Number()),
      availableReplicas: Type.Optional(Type.Number()),
    }),
  ),
});

const jobConditionSchema = Type.Object({ type: Type.String(), status: Type.String() });

export const jobSchema = Type.Object({
  metadata: metadataSchema,
  status: Type.Optional(
    Type.Object({
      active: Type.Optional(Type.Number()),
      succeeded: Type.Optional(Type.Number()),
      failed: Type.Optional(Type.Number()),
      completionTime: Type.Optional(Type.String()),
      conditions: Type.Optional(Type.Array(jobConditionSchema)),
    }),
  ),
});

const secretListSchema = Type.Object({ items: Type.Array(secretSchema) });
const serviceListSchema = Type.Object({ items: Type.Array(serviceSchema) });
const deploymentListSchema = Type.Object({ items: Type.Array(deploymentSchema) });
const jobListSchema = Type.Object({ items: Type.Array(jobSchema) });

/* ---------- Types ---------- */

export type K8sSecret = Static<typeof secretSchema>;
export type K8sService = Static<typeof serviceSchema>;
export type K8sDeployment = Static<typeof deploymentSchema>;
export type K8sJob = Static<typeof jobSchema>;

/* ---------- Parsing ---------- */

function parseJson(output: string, what: string): unknown {
  try {
    return JSON.parse(output);
  } catch (error) {
    throw new ConfigurationError(`kubectl returned invalid JSON for ${what}`, { cause: error });
  }
}

function rejectDocument(schema: TSchema, value: unknown, what: string): never {
  const first = Value.Errors(schema, value).First();
  throw new ConfigurationError(
    `Unexpected ${what} from kubectl at ${first?.path || "/"}: ${first?.message ?? "does not match schema"}`,
  );
}

export function parseSecretList(output: string): K8sSecret[] {
  const value = parseJson(output, "secrets");
  if (Value.Check(secretListSchema, value)) return value.items;
  return rejectDocument(secretListSchema, value, "secrets");
}

export function parseServiceList(output: string): K8sService[] {
  const value = parseJson(output, "services");
  if (Value.Check(serviceListSchema, value)) return value.items;
  return rejectDocument(serviceListSchema, value, "services");
}

export function parseDeploymentList(output: string): K8sDeployment[] {
  const value = parseJson(output, "deployments");
  if (Value.Check(deploymentListSchema, value)) return value.items;
  return rejectDocument(deploymentListSchema, value, "deployments");
}

export function parseJobList(output: string): K8sJob[] {
  const value = parseJson(output, "jobs");
  if (Value.Check(jobListSchema, value)) return value.items;
  return rejectDocument(jobListSchema, value, "jobs");
}
