export type NotFoundTarget = "groupVersion" | "namespace" | "pod";

/**
 * The platform reported a version string we can't interpret.
 */
export class MalformedVersionError extends Error {
  constructor(public readonly version: string) {
    super(`invalid Kubernetes version: "${version}"`);
    this.name = "MalformedVersionError";
    Object.setPrototypeOf(this, MalformedVersionError.prototype);
  }
}

/**
 * A group/version, namespace or pod is absent from the cluster.
 * Adapters keep the client exception as `cause`.
 */
export class NotFoundError extends Error {
  constructor(
    public readonly target: NotFoundTarget,
    public readonly objectName: string,
    options?: { cause?: unknown }
  ) {
    super(`${target} "${objectName}" not found`, options);
    this.name = "NotFoundError";
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly variable: string
  ) {
    super(message);
    this.name = "ConfigError";
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}
