import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  EndpointRegistrar,
  buildEndpointRecord,
  diffEndpoint,
  type EndpointIdentity,
} from '../../../src/services/endpoint-registrar.js';
import { RegistrySoftFailure } from '../../../src/api/errors.js';
import type { EndpointRecord } from '../../../src/types/registry.js';
import { InMemoryEndpointRegistry, silentLogger } from '../../helpers/fakes.js';

function identity(overrides: Partial<EndpointIdentity> = {}): EndpointIdentity {
  return {
    project: 'demo',
    endpointName: 'churn',
    functionName: 'serving',
    functionUid: 'fn-uid-1',
    functionTag: 'latest',
    modelName: 'churn',
    modelUid: 'model-uid-1',
    modelTag: 'v3',
    modelDbKey: 'churn-db',
    labels: { team: 'risk' },
    modelClass: 'SumModel',
    trackModels: true,
    ...overrides,
  };
}

function seed(registry: InMemoryEndpointRegistry, record: EndpointRecord, uid = 'ep-42'): void {
  registry.records.set(`${record.metadata.project}/${record.metadata.name}`, {
    ...record,
    metadata: { ...record.metadata, uid },
  });
}

describe('buildEndpointRecord', () => {
  it('derives the monitoring mode from tracking', () => {
    expect(buildEndpointRecord(identity()).status.monitoringMode).toBe('enabled');
    expect(buildEndpointRecord(identity({ trackModels: false })).status.monitoringMode).toBe('disabled');
  });

  it('maps identity fields into metadata and spec', () => {
    expect(buildEndpointRecord(identity())).toEqual({
      metadata: { project: 'demo', name: 'churn', labels: { team: 'risk' }, endpointType: 'node-ep' },
      spec: {
        functionName: 'serving',
        functionUid: 'fn-uid-1',
        functionTag: 'latest',
        modelName: 'churn',
        modelUid: 'model-uid-1',
        modelTag: 'v3',
        modelDbKey: 'churn-db',
        modelClass: 'SumModel',
      },
      status: { monitoringMode: 'enabled' },
    });
  });
});

describe('diffEndpoint', () => {
  it('is empty when nothing drifted', () => {
    const record = buildEndpointRecord(identity({ labels: { a: '1', b: '2' } }));
    expect(diffEndpoint(record, identity({ labels: { b: '2', a: '1' } }))).toEqual({});
  });

  it('carries only the drifted fields', () => {
    const record = buildEndpointRecord(identity({ modelTag: 'v2', labels: { team: 'ops' } }));

    expect(diffEndpoint(record, identity())).toEqual({ modelTag: 'v3', labels: { team: 'risk' } });
  });

  it('compares nullable fields', () => {
    const record = buildEndpointRecord(identity({ modelUid: null, functionUid: null }));

    expect(diffEndpoint(record, identity())).toEqual({ modelUid: 'model-uid-1', functionUid: 'fn-uid-1' });
  });
});

describe('EndpointRegistrar', () => {
  let registry: InMemoryEndpointRegistry;
  let onRegistryFailure: ReturnType<typeof vi.fn>;
  let registrar: EndpointRegistrar;

  beforeEach(() => {
    registry = new InMemoryEndpointRegistry();
    onRegistryFailure = vi.fn();
    registrar = new EndpointRegistrar(registry, { logger: silentLogger, hooks: { onRegistryFailure } });
  });

  it('creates a missing endpoint when tracking is enabled', async () => {
    const uid = await registrar.reconcile(identity());

    expect(uid).toBe('ep-1');
    expect(registry.created).toEqual([buildEndpointRecord(identity())]);
    expect(registry.patches).toHaveLength(0);
  });

  it('shares one lookup between concurrent calls', async () => {
    const [first, second] = await Promise.all([
      registrar.reconcile(identity()),
      registrar.reconcile(identity()),
    ]);

    expect([first, second]).toEqual(['ep-1', 'ep-1']);
    expect(registry.lookups).toBe(1);
    expect(registry.created).toHaveLength(1);
  });

  it('looks up again on later calls without creating twice', async () => {
    await registrar.reconcile(identity());
    const again = await registrar.reconcile(identity());

    expect(again).toBe('ep-1');
    expect(registry.lookups).toBe(2);
    expect(registry.created).toHaveLength(1);
    expect(registry.patches).toHaveLength(0);
  });

  it('returns the created uid when the new record is not yet visible', async () => {
    await registrar.reconcile(identity());
    registry.records.clear();

    await expect(registrar.reconcile(identity())).resolves.toBe('ep-1');
    expect(registry.created).toHaveLength(1);
  });

  it('patches drift found on a repeated call', async () => {
    await registrar.reconcile(identity());

    await expect(registrar.reconcile(identity({ modelUid: 'model-uid-2' }))).resolves.toBe('ep-1');
    await registrar.reconcile(identity({ modelUid: 'model-uid-2' }));

    expect(registry.patches).toEqual([
      { project: 'demo', name: 'churn', endpointId: 'ep-1', attributes: { modelUid: 'model-uid-2' } },
    ]);
  });

  it('retries the lookup after a soft failure', async () => {
    registry.failWith.get = new Error('registry unavailable');
    await expect(registrar.reconcile(identity())).resolves.toBeUndefined();

    registry.failWith = {};
    await expect(registrar.reconcile(identity())).resolves.toBe('ep-1');
    expect(registry.lookups).toBe(2);
  });

  it('does not create when tracking is disabled', async () => {
    await expect(registrar.reconcile(identity({ trackModels: false }))).resolves.toBeUndefined();
    expect(registry.created).toHaveLength(0);
  });

  it('leaves an up-to-date endpoint alone', async () => {
    seed(registry, buildEndpointRecord(identity()));

    await expect(registrar.reconcile(identity())).resolves.toBe('ep-42');
    expect(registry.patches).toHaveLength(0);
    expect(registry.created).toHaveLength(0);
  });

  it('patches only the drifted fields, once', async () => {
    seed(registry, buildEndpointRecord(identity({ modelTag: 'v2', labels: { team: 'ops' } })));

    await expect(registrar.reconcile(identity())).resolves.toBe('ep-42');

    expect(registry.patches).toEqual([
      {
        project: 'demo',
        name: 'churn',
        endpointId: 'ep-42',
        attributes: { modelTag: 'v3', labels: { team: 'risk' } },
      },
    ]);

    await registrar.reconcile(identity());
    expect(registry.patches).toHaveLength(1);
  });

  it('patches the monitoring mode when tracking is turned off', async () => {
    seed(registry, buildEndpointRecord(identity()));

    await registrar.reconcile(identity({ trackModels: false }));

    expect(registry.patches[0]?.attributes).toEqual({ monitoringMode: 'disabled' });
  });

  it('treats lookup errors as soft failures', async () => {
    registry.failWith.get = new Error('registry unavailable');

    await expect(registrar.reconcile(identity())).resolves.toBeUndefined();

    expect(registry.created).toHaveLength(0);
    expect(onRegistryFailure).toHaveBeenCalledTimes(1);
    const failure: unknown = onRegistryFailure.mock.calls[0]?.[1];
    expect(failure).toBeInstanceOf(RegistrySoftFailure);
    expect(failure).toMatchObject({
      stage: 'lookup',
      message: 'endpoint registry lookup failed: registry unavailable',
    });
  });

  it('treats create errors as soft failures', async () => {
    registry.failWith.create = new Error('quota exceeded');

    await expect(registrar.reconcile(identity())).resolves.toBeUndefined();
    expect(onRegistryFailure.mock.calls[0]?.[1]).toMatchObject({ stage: 'create' });
  });

  it('treats patch errors as soft failures', async () => {
    seed(registry, buildEndpointRecord(identity({ modelClass: 'OldModel' })));
    registry.failWith.patch = new Error('conflict');

    await expect(registrar.reconcile(identity())).resolves.toBeUndefined();
    expect(onRegistryFailure.mock.calls[0]?.[1]).toMatchObject({ stage: 'patch' });
  });
});
