import type {
  ConnectionConfiguration,
  CustomAttribute,
  EndpointAddress,
  KeyedDiff,
  ProviderUpdates,
  RemoteProvider,
  ResourceId,
} from "@/lib/types";

const ADDRESS_FIELDS = ["hostname", "port"] as const satisfies readonly (keyof EndpointAddress)[];
const CUSTOM_ATTRIBUTE_FIELDS = ["value"] as const satisfies readonly (keyof CustomAttribute)[];

/** Fields of `desired` that differ from `existing`, or null when none do. */
function changedFields<T extends object>(
  existing: T,
  desired: T,
  fields: readonly (keyof T)[],
): Partial<T> | null {
  const changes: Partial<T> = {};
  let changed = false;
  for (const field of fields) {
    if (existing[field] !== desired[field]) {
      changes[field] = desired[field];
      changed = true;
    }
  }
  return changed ? changes : null;
}

/**
 * Partitions two keyed record sets. A key lands in exactly one of
 * Added / Updated / Removed, or in none when both sides agree on every field.
 */
export function diffKeyed<T extends object>(
  current: Map<string, T>,
  desired: Map<string, T>,
  fields: readonly (keyof T)[],
): KeyedDiff<T> {
  const diff: KeyedDiff<T> = { Added: {}, Updated: {}, Removed: {} };

  for (const [key, record] of desired) {
    const existing = current.get(key);
    if (!existing) {
      diff.Added[key] = record;
      continue;
    }
    const changes = changedFields(existing, record, fields);
    if (changes) diff.Updated[key] = changes;
  }

  for (const [key, record] of current) {
    if (!desired.has(key)) diff.Removed[key] = record;
  }

  return diff;
}

export function isEmptyDiff(diff: KeyedDiff<unknown>): boolean {
  return (
    Object.keys(diff.Added).length === 0 &&
    Object.keys(diff.Updated).length === 0 &&
    Object.keys(diff.Removed).length === 0
  );
}

// ---- Providers ----

export function endpointAddress(endpoint: { hostname?: string | null; port?: number | null }): EndpointAddress {
  return { hostname: endpoint.hostname ?? null, port: endpoint.port ?? null };
}

export interface DesiredProviderState {
  connections: ConnectionConfiguration[];
  zoneId: ResourceId;
  region: string | null;
}

/**
 * Changes needed to bring `current` to `desired`, keyed by endpoint role.
 * Returns null when endpoints, zone and region already match.
 */
export function providerRequiredUpdates(
  current: RemoteProvider,
  desired: DesiredProviderState,
): ProviderUpdates | null {
  const desiredByRole = new Map(
    desired.connections.map((connection) => [connection.endpoint.role, endpointAddress(connection.endpoint)]),
  );
  const currentByRole = new Map(current.endpoints.map((endpoint) => [endpoint.role, endpointAddress(endpoint)]));

  const endpointDiff = diffKeyed(currentByRole, desiredByRole, ADDRESS_FIELDS);
  const zoneChanged = current.zone_id !== desired.zoneId;
  const regionChanged = current.provider_region !== desired.region;

  if (isEmptyDiff(endpointDiff) && !zoneChanged && !regionChanged) {
    return null;
  }

  const updates: ProviderUpdates = {
    Added: endpointDiff.Added,
    Updated: { ...endpointDiff.Updated },
    Removed: endpointDiff.Removed,
  };
  if (zoneChanged) updates.Updated.zone_id = desired.zoneId;
  if (regionChanged) updates.Updated.provider_region = desired.region;
  return updates;
}

/** Roles whose endpoint was added or changed; scalar entries never match a role. */
export function rolesWithChanges(updates: ProviderUpdates): Set<string> {
  return new Set([...Object.keys(updates.Added), ...Object.keys(updates.Updated)]);
}

// ---- Custom attributes ----

/** Composite key: the same name in two sections is two attributes. */
export function customAttributeKey(attribute: Pick<CustomAttribute, "name" | "section">): string {
  return JSON.stringify([attribute.name, attribute.section]);
}

export function diffCustomAttributes(
  current: CustomAttribute[],
  desired: CustomAttribute[],
): KeyedDiff<CustomAttribute> {
  const toEntry = (attribute: CustomAttribute): [string, CustomAttribute] => [
    customAttributeKey(attribute),
    { name: attribute.name, section: attribute.section, value: attribute.value },
  ];
  return diffKeyed(new Map(current.map(toEntry)), new Map(desired.map(toEntry)), CUSTOM_ATTRIBUTE_FIELDS);
}
