import { parseMinorVersion } from "../utils/apiVersion";
import {
  POD_MONITOR_PROBE,
  SECURITY_POLICY_PROBE,
  SERVICE_MESH_PROBE,
  resourceExists,
} from "./discovery.service";
import type {
  CapabilityName,
  CapabilitySnapshot,
  CapabilityState,
  DiscoveryCapability,
  ResourceProbe,
} from "../types";

/** Seccomp profiles went GA in Kubernetes 1.24. */
export const SECCOMP_MIN_MINOR_VERSION = 24;

export interface CapabilityProbes {
  securityPolicy: ResourceProbe;
  serviceMesh: ResourceProbe;
  podMonitor: ResourceProbe;
}

export const DEFAULT_CAPABILITY_PROBES: CapabilityProbes = {
  securityPolicy: SECURITY_POLICY_PROBE,
  serviceMesh: SERVICE_MESH_PROBE,
  podMonitor: POD_MONITOR_PROBE,
};

/**
 * Cached answers to "does this cluster support X".
 *
 * One instance is created by the bootstrap sequence and handed to whoever
 * needs to gate on a capability. Detectors hit the API server; accessors
 * only read what the last detection stored and never fail.
 */
export class ClusterCapabilities {
  private readonly probes: CapabilityProbes;
  private readonly flags: Record<CapabilityName, CapabilityState> = {
    securityPolicy: undefined,
    seccompProfile: undefined,
    serviceMesh: undefined,
  };
  // Bumped when a detection starts; only the latest detection of a flag may write it.
  private readonly generations: Record<CapabilityName, number> = {
    securityPolicy: 0,
    seccompProfile: 0,
    serviceMesh: 0,
  };
  private detectedAt: string | null = null;

  constructor(
    private readonly discovery: DiscoveryCapability,
    probes: Partial<CapabilityProbes> = {}
  ) {
    this.probes = { ...DEFAULT_CAPABILITY_PROBES, ...probes };
  }

  /* ---------------- DETECTORS ---------------- */

  /**
   * Are we running under a platform with security context constraints
   * (OpenShift)? On failure the previous value is kept.
   */
  async detectSecurityPolicy(): Promise<boolean> {
    const { groupVersion, resource } = this.probes.securityPolicy;
    return this.detect("securityPolicy", () =>
      resourceExists(this.discovery, groupVersion, resource)
    );
  }

  /**
   * Should pods carry a SeccompProfile? Decided from the server's minor
   * version. On failure the flag drops to false.
   */
  async detectSeccompSupport(): Promise<boolean> {
    return this.detect(
      "seccompProfile",
      async () => {
        const { minor } = await this.discovery.serverVersion();
        return parseMinorVersion(minor) >= SECCOMP_MIN_MINOR_VERSION;
      },
      false
    );
  }

  /**
   * Is the mesh's Sidecar resource served? Mesh presence alone doesn't mean
   * a workload gets a sidecar; see MeshInjectionService.
   */
  async detectServiceMesh(): Promise<boolean> {
    const { groupVersion, resource } = this.probes.serviceMesh;
    return this.detect("serviceMesh", () =>
      resourceExists(this.discovery, groupVersion, resource)
    );
  }

  /**
   * PodMonitor lookup for resource creation time. Not cached.
   */
  async podMonitorExists(): Promise<boolean> {
    const { groupVersion, resource } = this.probes.podMonitor;
    return resourceExists(this.discovery, groupVersion, resource);
  }

  /**
   * Run every caching detector in turn. Rejects on the first failure.
   */
  async detectAll(): Promise<CapabilitySnapshot> {
    await this.detectSecurityPolicy();
    await this.detectSeccompSupport();
    await this.detectServiceMesh();
    this.detectedAt = new Date().toISOString();
    return this.snapshot();
  }

  /* ---------------- ACCESSORS ---------------- */

  haveSecurityPolicy(): boolean {
    return this.flags.securityPolicy ?? false;
  }

  haveSeccompSupport(): boolean {
    return this.flags.seccompProfile ?? false;
  }

  haveServiceMesh(): boolean {
    return this.flags.serviceMesh ?? false;
  }

  detectionOf(name: CapabilityName): CapabilityState {
    return this.flags[name];
  }

  snapshot(): CapabilitySnapshot {
    return {
      securityPolicy: this.flags.securityPolicy,
      seccompProfile: this.flags.seccompProfile,
      serviceMesh: this.flags.serviceMesh,
      detectedAt: this.detectedAt,
    };
  }

  private async detect(
    name: CapabilityName,
    probe: () => Promise<boolean>,
    valueOnFailure?: boolean
  ): Promise<boolean> {
    const generation = ++this.generations[name];
    let value: boolean;
    try {
      value = await probe();
    } catch (err) {
      if (valueOnFailure !== undefined && generation === this.generations[name]) {
        this.flags[name] = valueOnFailure;
      }
      throw err;
    }

    if (generation === this.generations[name]) {
      this.flags[name] = value;
    }
    return value;
  }
}
