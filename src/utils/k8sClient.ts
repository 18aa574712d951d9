import * as k8s from "@kubernetes/client-node";
import { NotFoundError, type NotFoundTarget } from "../errors";
import { splitGroupVersion } from "./apiVersion";
import type { DiscoveryCapability, ObjectReader } from "../types";

/**
 * Loads kubeconfig:
 * - In-cluster → ServiceAccount
 * - Local dev → ~/.kube/config (or $KUBECONFIG)
 */
export function createKubeConfig(): k8s.KubeConfig {
  const kc = new k8s.KubeConfig();
  if (process.env.KUBERNETES_SERVICE_HOST) {
    kc.loadFromCluster();
  } else {
    kc.loadFromDefault();
  }
  return kc;
}

function isApiNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === 404;
}

// Only a 404 is translated; everything else surfaces untouched.
async function orNotFound<T>(
  target: NotFoundTarget,
  name: string,
  request: () => Promise<T>
): Promise<T> {
  try {
    return await request();
  } catch (err) {
    if (isApiNotFound(err)) {
      throw new NotFoundError(target, name, { cause: err });
    }
    throw err;
  }
}

export function createDiscoveryClient(kc: k8s.KubeConfig): DiscoveryCapability {
  const coreV1Api = kc.makeApiClient(k8s.CoreV1Api);
  const customObjectsApi = kc.makeApiClient(k8s.CustomObjectsApi);
  const versionApi = kc.makeApiClient(k8s.VersionApi);

  return {
    async resourcesFor(groupVersion) {
      const { group, version } = splitGroupVersion(groupVersion);
      const list = await orNotFound("groupVersion", groupVersion, () =>
        group === ""
          ? coreV1Api.getAPIResources()
          : customObjectsApi.getAPIResources({ group, version })
      );
      return list.resources.map((resource) => ({ name: resource.name }));
    },

    async serverVersion() {
      const info = await versionApi.getCode();
      return { major: info.major, minor: info.minor };
    },
  };
}

export function createObjectReader(kc: k8s.KubeConfig): ObjectReader {
  const coreV1Api = kc.makeApiClient(k8s.CoreV1Api);

  return {
    async getNamespace(name) {
      const namespace = await orNotFound("namespace", name, () =>
        coreV1Api.readNamespace({ name })
      );
      return { labels: namespace.metadata?.labels ?? {} };
    },

    async getPod(namespace, name) {
      const pod = await orNotFound("pod", `${namespace}/${name}`, () =>
        coreV1Api.readNamespacedPod({ name, namespace })
      );
      return { labels: pod.metadata?.labels ?? {} };
    },
  };
}
