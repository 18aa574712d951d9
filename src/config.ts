import { ConfigError } from "./errors";
import { DEFAULT_MESH_LABEL_OPTIONS, type MeshLabelOptions } from "./services/mesh.service";

export interface AppConfig {
  port: number;
  mesh: MeshLabelOptions;
  /** 0 disables periodic re-detection. */
  redetectIntervalMs: number;
}

function readNonNegativeInt(
  env: NodeJS.ProcessEnv,
  variable: string,
  fallback: number
): number {
  const raw = env[variable];
  if (raw === undefined || raw.trim() === "") return fallback;
  if (!/^[0-9]+$/.test(raw.trim())) {
    throw new ConfigError(`${variable} must be a non-negative integer, got "${raw}"`, variable);
  }
  return Number.parseInt(raw.trim(), 10);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: readNonNegativeInt(env, "PORT", 3001),
    mesh: {
      namespaceLabelKey: env.MESH_NAMESPACE_LABEL_KEY || DEFAULT_MESH_LABEL_OPTIONS.namespaceLabelKey,
      namespaceEnabledValue:
        env.MESH_NAMESPACE_ENABLED_VALUE || DEFAULT_MESH_LABEL_OPTIONS.namespaceEnabledValue,
      podLabelKey: env.MESH_POD_LABEL_KEY || DEFAULT_MESH_LABEL_OPTIONS.podLabelKey,
      podDisabledValue: env.MESH_POD_DISABLED_VALUE || DEFAULT_MESH_LABEL_OPTIONS.podDisabledValue,
    },
    redetectIntervalMs: readNonNegativeInt(env, "CAPABILITY_REDETECT_INTERVAL_MS", 0),
  };
}
