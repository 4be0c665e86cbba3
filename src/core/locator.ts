import type { ApiGateway } from "@/clients/manageiq-client";
import type { ResourceId } from "@/lib/types";

/**
 * Resolves a name to its id within a collection. The first match wins; the
 * server is expected to keep names unique.
 */
export async function findByName(
  gateway: ApiGateway,
  collection: string,
  name: string,
): Promise<ResourceId | null> {
  const members = await gateway.listCollection(collection);
  return members.find((member) => member.name === name)?.id ?? null;
}

export function findZoneByName(gateway: ApiGateway, zoneName: string) {
  return findByName(gateway, "zones", zoneName);
}

export function findProviderByName(gateway: ApiGateway, providerName: string) {
  return findByName(gateway, "providers", providerName);
}
