export {
  KubeControl,
  createKubeControl,
  jobOutcome,
  type DockerRegistryCredentials,
  type KubeControlOptions,
  type TolerantOptions,
} from "./cli-wrapper.js";

export {
  HelmClient,
  HelmRepositoryRegistry,
  createHelmClient,
  ingressControllerName,
  setValueArgs,
} from "./helm-wrapper.js";

export {
  INGRESS_NGINX_CHART,
  INGRESS_NGINX_REPO,
  type HelmClientOptions,
  type HelmInstallOptions,
  type HelmRepoOptions,
  type HelmUninstallOptions,
  type HelmValues,
  type IngressControllerOptions,
} from "./helm-types.js";

export {
  parseDeploymentList,
  parseJobList,
  parseSecretList,
  parseServiceList,
  type K8sDeployment,
  type K8sJob,
  type K8sSecret,
  type K8sService,
} from "./types.js";
