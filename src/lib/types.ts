// ============ Connection ============

export interface ManageIqConfig {
  url: string;
  username: string;
  password: string;
  verifySsl: boolean;
  caBundlePath?: string;
}

export type ResourceId = string;

export interface CollectionMember {
  id: ResourceId;
  name: string | null;
}

// ============ Endpoints ============

export interface Endpoint {
  role: string;
  hostname?: string;
  port?: number;
}

/** Credentials are opaque to the reconciler; only `authtype` is read. */
export interface Authentication {
  authtype: string;
  [field: string]: string;
}

export interface ConnectionConfiguration {
  endpoint: Endpoint;
  authentication: Authentication;
}

/** The part of an endpoint that is compared against the remote side. */
export interface EndpointAddress {
  hostname: string | null;
  port: number | null;
}

// ============ Remote records ============

export interface RemoteEndpoint extends EndpointAddress {
  role: string;
}

export interface RemoteProvider {
  id: ResourceId;
  name: string | null;
  zone_id: ResourceId | null;
  provider_region: string | null;
  endpoints: RemoteEndpoint[];
}

export type ValidationStatus = "Valid" | "Invalid" | (string & {}) | null;

export interface ValidationRecord {
  authtype: string;
  status: ValidationStatus;
  status_details: string;
  last_valid_on: string | null;
  last_invalid_on: string | null;
}

/** Validation records of one provider, keyed by authtype. */
export type ValidationSnapshot = Record<string, ValidationRecord>;

export interface CustomAttribute {
  name: string;
  section: string;
  value: string;
}

export interface RemoteCustomAttribute extends CustomAttribute {
  id: ResourceId;
  href: string | null;
}

export interface DeleteResponse {
  success: boolean;
  message: string;
  task_id: ResourceId | null;
}

// ============ Diff ============

export interface KeyedDiff<T> {
  Added: Record<string, T>;
  Updated: Record<string, Partial<T>>;
  Removed: Record<string, T>;
}

export type ScalarValue = string | number | null;

/** Endpoint diff by role; `Updated` also carries changed `zone_id` / `provider_region`. */
export interface ProviderUpdates {
  Added: Record<string, EndpointAddress>;
  Updated: Record<string, Partial<EndpointAddress> | ScalarValue>;
  Removed: Record<string, EndpointAddress>;
}

// ============ Results ============

export type ValidationDetails = Record<string, [status: string, details: string]>;

export interface ValidationOutcome {
  success: boolean;
  details: "All Valid" | ValidationDetails;
}

export interface ProviderUnchangedResult {
  changed: false;
  msg: string;
}

export interface ProviderChangedResult {
  provider_id: ResourceId | null;
  changed: true;
  msg: string;
  updates: ProviderUpdates | null;
}

export type ProviderResult = ProviderUnchangedResult | ProviderChangedResult;

export interface ProviderDeleteResult {
  task_id: ResourceId | null;
  changed: boolean;
  msg: string;
}

/** Server results on apply; the planned records on a dry run. */
export interface CustomAttributeResult {
  changed: boolean;
  msg: string;
  updates: {
    Added: CustomAttribute[];
    Updated: CustomAttribute[];
  };
}

export interface CustomAttributeDeleteResult {
  changed: boolean;
  msg: string;
  deleted: RemoteCustomAttribute[];
}
