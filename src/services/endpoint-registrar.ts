import type { Logger } from 'pino';
import {
  EndpointNotFoundError,
  RegistrySoftFailure,
  asError,
} from '../api/errors.js';
import { runHook, type ServingTelemetryHooks } from '../telemetry/hooks.js';
import type {
  EndpointAttributes,
  EndpointPatch,
  EndpointRecord,
  EndpointRegistry,
  MonitoringMode,
} from '../types/registry.js';

/**
 * Everything the registrar needs to build or compare an endpoint record
 */
export interface EndpointIdentity {
  project: string;
  /** Endpoint name (the served model name) */
  endpointName: string;
  functionName: string;
  functionUid: string | null;
  functionTag: string;
  modelName: string | null;
  modelUid: string | null;
  modelTag: string | null;
  modelDbKey: string | null;
  labels: Record<string, string>;
  modelClass: string;
  trackModels: boolean;
}

export interface EndpointRegistrarConfig {
  logger?: Logger;
  hooks?: ServingTelemetryHooks;
}

const DIFF_FIELDS: ReadonlyArray<keyof EndpointAttributes> = [
  'functionUid',
  'modelName',
  'modelUid',
  'modelTag',
  'modelDbKey',
  'labels',
  'modelClass',
  'monitoringMode',
];

function monitoringMode(trackModels: boolean): MonitoringMode {
  return trackModels ? 'enabled' : 'disabled';
}

function desiredAttributes(identity: EndpointIdentity): EndpointAttributes {
  return {
    functionUid: identity.functionUid,
    modelName: identity.modelName,
    modelUid: identity.modelUid,
    modelTag: identity.modelTag,
    modelDbKey: identity.modelDbKey,
    labels: identity.labels,
    modelClass: identity.modelClass,
    monitoringMode: monitoringMode(identity.trackModels),
  };
}

function remoteAttributes(record: EndpointRecord): EndpointAttributes {
  return {
    functionUid: record.spec.functionUid,
    modelName: record.spec.modelName,
    modelUid: record.spec.modelUid,
    modelTag: record.spec.modelTag,
    modelDbKey: record.spec.modelDbKey,
    labels: record.metadata.labels,
    modelClass: record.spec.modelClass,
    monitoringMode: record.status.monitoringMode,
  };
}

function sameLabels(a: Record<string, string>, b: Record<string, string>): boolean {
  const keys = Object.keys(a);
  if (keys.length !== Object.keys(b).length) {
    return false;
  }
  return keys.every((key) => Object.prototype.hasOwnProperty.call(b, key) && a[key] === b[key]);
}

/**
 * Fresh endpoint record for an identity
 */
export function buildEndpointRecord(identity: EndpointIdentity): EndpointRecord {
  return {
    metadata: {
      project: identity.project,
      name: identity.endpointName,
      labels: { ...identity.labels },
      endpointType: 'node-ep',
    },
    spec: {
      functionName: identity.functionName,
      functionUid: identity.functionUid,
      functionTag: identity.functionTag,
      modelName: identity.modelName,
      modelUid: identity.modelUid,
      modelTag: identity.modelTag,
      modelDbKey: identity.modelDbKey,
      modelClass: identity.modelClass,
    },
    status: {
      monitoringMode: monitoringMode(identity.trackModels),
    },
  };
}

/**
 * Fields of `identity` that differ from the remote record. Empty when in sync.
 */
export function diffEndpoint(record: EndpointRecord, identity: EndpointIdentity): EndpointPatch {
  const remote = remoteAttributes(record);
  const desired = desiredAttributes(identity);
  const patch: EndpointPatch = {};

  for (const field of DIFF_FIELDS) {
    switch (field) {
      case 'labels':
        if (!sameLabels(remote.labels, desired.labels)) {
          patch.labels = { ...desired.labels };
        }
        break;
      case 'monitoringMode':
        if (remote.monitoringMode !== desired.monitoringMode) {
          patch.monitoringMode = desired.monitoringMode;
        }
        break;
      case 'modelClass':
        if (remote.modelClass !== desired.modelClass) {
          patch.modelClass = desired.modelClass;
        }
        break;
      default:
        if (remote[field] !== desired[field]) {
          patch[field] = desired[field];
        }
    }
  }

  return patch;
}

/**
 * Endpoint Registrar
 *
 * Reconciles the served model with its endpoint record: creates the record
 * when tracking is enabled and it is missing, and patches only drifted fields
 * when it exists. Registry errors other than "not found" are soft failures,
 * logged and reported as an absent endpoint.
 *
 * Concurrent calls for the same (project, function, endpoint) share one
 * registry round-trip. Later calls look up and diff again, so drift is
 * patched; an endpoint this registrar created is never created twice.
 */
export class EndpointRegistrar {
  private readonly registry: EndpointRegistry;
  private readonly logger?: Logger;
  private readonly hooks?: ServingTelemetryHooks;
  private readonly inFlight = new Map<string, Promise<string | undefined>>();
  private readonly created = new Map<string, string>();

  constructor(registry: EndpointRegistry, config: EndpointRegistrarConfig = {}) {
    this.registry = registry;
    this.logger = config.logger;
    this.hooks = config.hooks;
  }

  public reconcile(identity: EndpointIdentity): Promise<string | undefined> {
    const key = `${identity.project}/${identity.functionName}/${identity.endpointName}`;
    let pending = this.inFlight.get(key);
    if (!pending) {
      pending = this.run(key, identity).finally(() => this.inFlight.delete(key));
      this.inFlight.set(key, pending);
    }
    return pending;
  }

  private async run(key: string, identity: EndpointIdentity): Promise<string | undefined> {
    let existing: EndpointRecord | undefined;
    try {
      existing = await this.registry.getEndpoint({
        project: identity.project,
        name: identity.endpointName,
        functionName: identity.functionName,
        functionTag: identity.functionTag,
      });
    } catch (error) {
      if (!(error instanceof EndpointNotFoundError)) {
        return this.softFailure(identity, new RegistrySoftFailure('lookup', asError(error)));
      }
    }

    if (!existing) {
      const createdUid = this.created.get(key);
      if (createdUid) {
        this.logger?.debug(
          { project: identity.project, endpoint: identity.endpointName, uid: createdUid },
          'Endpoint already created, lookup not yet visible'
        );
        return createdUid;
      }
      if (!identity.trackModels) {
        this.logger?.debug(
          { project: identity.project, endpoint: identity.endpointName },
          'Endpoint not registered and tracking disabled'
        );
        return undefined;
      }
      return this.create(key, identity);
    }

    return this.patch(identity, existing);
  }

  private async create(key: string, identity: EndpointIdentity): Promise<string | undefined> {
    try {
      const created = await this.registry.createEndpoint(buildEndpointRecord(identity));
      if (created.metadata.uid) {
        this.created.set(key, created.metadata.uid);
      }
      this.logger?.info(
        { project: identity.project, endpoint: identity.endpointName, uid: created.metadata.uid },
        'Created model endpoint'
      );
      return created.metadata.uid;
    } catch (error) {
      return this.softFailure(identity, new RegistrySoftFailure('create', asError(error)));
    }
  }

  private async patch(identity: EndpointIdentity, existing: EndpointRecord): Promise<string | undefined> {
    const uid = existing.metadata.uid;
    const changes = diffEndpoint(existing, identity);
    const fields = Object.keys(changes);

    if (fields.length === 0 || !uid) {
      return uid;
    }

    try {
      await this.registry.patchEndpoint(identity.project, identity.endpointName, uid, changes);
      this.logger?.info(
        { project: identity.project, endpoint: identity.endpointName, uid, fields },
        'Patched model endpoint'
      );
      return uid;
    } catch (error) {
      return this.softFailure(identity, new RegistrySoftFailure('patch', asError(error)));
    }
  }

  private softFailure(identity: EndpointIdentity, failure: RegistrySoftFailure): undefined {
    this.logger?.warn(
      {
        project: identity.project,
        endpoint: identity.endpointName,
        stage: failure.stage,
        err: failure.cause,
      },
      failure.message
    );
    runHook(this.logger, 'onRegistryFailure', () =>
      this.hooks?.onRegistryFailure?.(identity.endpointName, failure)
    );
    return undefined;
  }
}
