import { MalformedVersionError } from "../errors";

// Some providers (EKS among them) append a "+" to the minor version to mark
// back-ported maintenance patches.
const MINOR_VERSION_PATTERN = /^([0-9]+)\+?$/;

/**
 * Parse the minor version reported by the API server, e.g. "24" or "24+".
 */
export function parseMinorVersion(minor: string): number {
  const match = MINOR_VERSION_PATTERN.exec(minor);
  if (!match) {
    throw new MalformedVersionError(minor);
  }
  return Number.parseInt(match[1], 10);
}

export interface GroupVersion {
  group: string;
  version: string;
}

/**
 * "v1" → core group; "networking.istio.io/v1beta1" → named group.
 */
export function splitGroupVersion(apiVersion: string): GroupVersion {
  const parts = apiVersion.split("/");
  if (parts.some((part) => part.length === 0) || parts.length > 2) {
    throw new Error(`invalid API group/version: "${apiVersion}"`);
  }
  if (parts.length === 1) {
    return { group: "", version: parts[0] };
  }
  return { group: parts[0], version: parts[1] };
}
