/**
 * Contracts the detection core consumes. The host supplies implementations
 * (see utils/k8sClient.ts); tests supply fakes.
 */

export interface ApiResourceDescriptor {
  name: string;
}

export interface ServerVersionInfo {
  major: string;
  minor: string;
}

/** Rejects with NotFoundError when a group/version isn't served. */
export interface DiscoveryCapability {
  resourcesFor(groupVersion: string): Promise<ApiResourceDescriptor[]>;
  serverVersion(): Promise<ServerVersionInfo>;
}

export interface LabeledObject {
  labels: Record<string, string>;
}

/** Rejects with NotFoundError when the namespace or pod doesn't exist. */
export interface ObjectReader {
  getNamespace(name: string): Promise<LabeledObject>;
  getPod(namespace: string, name: string): Promise<LabeledObject>;
}

export interface ResourceProbe {
  groupVersion: string;
  resource: string;
}

export type CapabilityName = "securityPolicy" | "seccompProfile" | "serviceMesh";

/** `undefined` until the matching detector has completed once. */
export type CapabilityState = boolean | undefined;

export interface CapabilitySnapshot {
  securityPolicy: CapabilityState;
  seccompProfile: CapabilityState;
  serviceMesh: CapabilityState;
  detectedAt: string | null;
}
