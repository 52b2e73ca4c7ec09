/**
 * Model identity resolution
 *
 * The served model's name, version and protocol. The version comes from an
 * explicit `name:version` string or, failing that, from the tag of the model
 * artifact behind `modelPath`. Resolution runs once: concurrent first callers
 * share the same in-flight promise and every later caller reads the cached
 * identity.
 */

import type { Logger } from 'pino';
import { SERVING } from '../config/defaults.js';
import type { ArtifactResolver, ModelSpec } from '../types/model.js';

export interface ModelIdentity {
  readonly name: string;
  readonly version: string;
  readonly protocol: string;
  /** `name:version` */
  readonly versionedName: string;
  readonly labels: Readonly<Record<string, string>>;
  readonly spec?: ModelSpec;
}

export interface ModelIdentityOptions {
  /** `name` or `name:version` */
  name: string;
  modelPath?: string;
  protocol?: string;
  artifacts?: ArtifactResolver;
  logger?: Logger;
}

/**
 * Split `name:version` into its parts (version may be empty)
 */
export function parseModelName(raw: string): { name: string; version: string } {
  const separator = raw.indexOf(':');
  if (separator === -1) {
    return { name: raw, version: '' };
  }
  return { name: raw.slice(0, separator), version: raw.slice(separator + 1) };
}

export class ModelIdentityResolver {
  public readonly name: string;
  public readonly protocol: string;
  private readonly explicitVersion: string;
  private readonly modelPath?: string;
  private readonly artifacts?: ArtifactResolver;
  private readonly logger?: Logger;

  private pending: Promise<ModelIdentity> | null = null;
  private resolved: ModelIdentity | null = null;

  constructor(options: ModelIdentityOptions) {
    const { name, version } = parseModelName(options.name);
    this.name = name;
    this.explicitVersion = version;
    this.protocol = options.protocol ?? SERVING.PROTOCOL;
    this.modelPath = options.modelPath;
    this.artifacts = options.artifacts;
    this.logger = options.logger;
  }

  /**
   * Identity if already resolved, without triggering resolution
   */
  public current(): ModelIdentity | undefined {
    return this.resolved ?? undefined;
  }

  /**
   * Resolve once; artifact lookup failures degrade to the explicit/default version
   */
  public resolve(): Promise<ModelIdentity> {
    if (this.resolved) {
      return Promise.resolve(this.resolved);
    }
    if (!this.pending) {
      this.pending = this.compute().then((identity) => {
        this.resolved = identity;
        return identity;
      });
    }
    return this.pending;
  }

  private async compute(): Promise<ModelIdentity> {
    const spec = await this.fetchSpec();
    const version = this.explicitVersion || spec?.tag || SERVING.DEFAULT_VERSION;

    return {
      name: this.name,
      version,
      protocol: this.protocol,
      versionedName: `${this.name}:${version}`,
      labels: spec?.labels ?? {},
      spec,
    };
  }

  private async fetchSpec(): Promise<ModelSpec | undefined> {
    if (!this.modelPath || !this.artifacts) {
      return undefined;
    }
    try {
      return await this.artifacts.getModelSpec(this.modelPath);
    } catch (error) {
      this.logger?.warn(
        { model: this.name, modelPath: this.modelPath, err: error },
        'Failed to resolve model artifact; using explicit version'
      );
      return undefined;
    }
  }
}
