import { NotFoundError } from "../errors";
import type { ApiResourceDescriptor, DiscoveryCapability, ResourceProbe } from "../types";

/**
 * Well-known optional APIs we gate features on.
 */
export const SECURITY_POLICY_PROBE: ResourceProbe = {
  groupVersion: "security.openshift.io/v1",
  resource: "securitycontextconstraints",
};

export const SERVICE_MESH_PROBE: ResourceProbe = {
  groupVersion: "networking.istio.io/v1beta1",
  resource: "sidecars",
};

export const POD_MONITOR_PROBE: ResourceProbe = {
  groupVersion: "monitoring.coreos.com/v1",
  resource: "podmonitors",
};

/**
 * True when `resource` is registered under `groupVersion`.
 * A group/version the cluster doesn't serve counts as absent; any other
 * discovery error is rethrown as-is.
 */
export async function resourceExists(
  discovery: DiscoveryCapability,
  groupVersion: string,
  resource: string
): Promise<boolean> {
  let resources: ApiResourceDescriptor[];
  try {
    resources = await discovery.resourcesFor(groupVersion);
  } catch (err) {
    if (err instanceof NotFoundError && err.target === "groupVersion") {
      return false;
    }
    throw err;
  }

  return resources.some((descriptor) => descriptor.name === resource);
}
