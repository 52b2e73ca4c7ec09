/**
 * Endpoint registry contract
 *
 * Only the surface the registrar needs; the registry's persistence schema is
 * owned elsewhere.
 */

export type MonitoringMode = 'enabled' | 'disabled';

export interface EndpointRecord {
  metadata: {
    uid?: string;
    project: string;
    name: string;
    labels: Record<string, string>;
    endpointType: 'node-ep';
  };
  spec: {
    functionName: string;
    functionUid: string | null;
    functionTag: string;
    modelName: string | null;
    modelUid: string | null;
    modelTag: string | null;
    modelDbKey: string | null;
    modelClass: string;
  };
  status: {
    monitoringMode: MonitoringMode;
  };
}

/**
 * Fields the registrar keeps in sync with the remote copy.
 */
export interface EndpointAttributes {
  functionUid: string | null;
  modelName: string | null;
  modelUid: string | null;
  modelTag: string | null;
  modelDbKey: string | null;
  labels: Record<string, string>;
  modelClass: string;
  monitoringMode: MonitoringMode;
}

export type EndpointPatch = Partial<EndpointAttributes>;

export interface EndpointLookup {
  project: string;
  name: string;
  functionName: string;
  functionTag: string;
}

export interface EndpointRegistry {
  /** Throws EndpointNotFoundError when no record matches */
  getEndpoint(lookup: EndpointLookup): Promise<EndpointRecord>;
  createEndpoint(record: EndpointRecord): Promise<EndpointRecord>;
  patchEndpoint(
    project: string,
    name: string,
    endpointId: string,
    attributes: EndpointPatch
  ): Promise<EndpointRecord>;
}
