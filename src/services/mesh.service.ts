import type { ObjectReader } from "../types";

export interface MeshLabelOptions {
  /** Namespace label that turns sidecar injection on. Default: istio-injection */
  namespaceLabelKey: string;
  /** Default: "enabled" */
  namespaceEnabledValue: string;
  /**
   * Pod label that opts a pod out. Default: sidecar.istio.io/inject.
   * Older deployments labelled pods with "sidecar.istio.io/injec"; set this
   * to match if yours did.
   */
  podLabelKey: string;
  /** Default: "false" */
  podDisabledValue: string;
}

export const DEFAULT_MESH_LABEL_OPTIONS: MeshLabelOptions = {
  namespaceLabelKey: "istio-injection",
  namespaceEnabledValue: "enabled",
  podLabelKey: "sidecar.istio.io/inject",
  podDisabledValue: "false",
};

/**
 * Decides, per workload, whether the mesh will touch it. The mesh being
 * installed isn't enough: namespaces opt in and pods can opt out.
 * Read errors (including NotFoundError) reach the caller unchanged.
 */
export class MeshInjectionService {
  private readonly options: MeshLabelOptions;

  constructor(
    private readonly objects: ObjectReader,
    options: Partial<MeshLabelOptions> = {}
  ) {
    this.options = { ...DEFAULT_MESH_LABEL_OPTIONS, ...options };
  }

  async isNamespaceInjectionEnabled(namespace: string): Promise<boolean> {
    const { labels } = await this.objects.getNamespace(namespace);
    return labels[this.options.namespaceLabelKey] === this.options.namespaceEnabledValue;
  }

  async isPodIgnored(namespace: string, podName: string): Promise<boolean> {
    const { labels } = await this.objects.getPod(namespace, podName);
    return labels[this.options.podLabelKey] === this.options.podDisabledValue;
  }

  /**
   * Namespace opted in and pod not opted out.
   */
  async isWorkloadInjected(namespace: string, podName: string): Promise<boolean> {
    if (!(await this.isNamespaceInjectionEnabled(namespace))) {
      return false;
    }
    return !(await this.isPodIgnored(namespace, podName));
  }
}
