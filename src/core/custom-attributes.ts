import type { ApiGateway } from "@/clients/manageiq-client";
import { decodeActionOutcomes, decodeActionResults, decodeCustomAttributes } from "@/clients/decode";
import { customAttributeKey, diffCustomAttributes } from "@/core/diff";
import { findByName } from "@/core/locator";
import { ENTITY_COLLECTIONS, type EntityType } from "@/lib/constants";
import { attempt, ReconcileError } from "@/lib/errors";
import type {
  CustomAttribute,
  CustomAttributeDeleteResult,
  CustomAttributeResult,
  RemoteCustomAttribute,
} from "@/lib/types";
import { consola } from "consola";

export interface CustomAttributeRequest {
  entityType: EntityType;
  entityName: string;
  attributes: CustomAttribute[];
}

export interface CustomAttributeDeleteRequest {
  entityType: EntityType;
  entityName: string;
  attributes: Pick<CustomAttribute, "name" | "section">[];
}

export interface CustomAttributeOptions {
  dryRun?: boolean;
}

async function locateEntity(
  gateway: ApiGateway,
  entityType: EntityType,
  entityName: string,
): Promise<string> {
  const collection = ENTITY_COLLECTIONS[entityType];
  const id = await attempt(`find ${entityType}`, () => findByName(gateway, collection, entityName));
  if (id === null) {
    throw new ReconcileError(`Failed to find ${entityName} ${entityType}`);
  }
  return `/${collection}/${id}`;
}

export function fetchCustomAttributes(gateway: ApiGateway, entityPath: string): Promise<RemoteCustomAttribute[]> {
  return attempt("get custom attributes", async () =>
    decodeCustomAttributes(await gateway.get(entityPath, { expand: "custom_attributes" })),
  );
}

function resourceRef(attribute: RemoteCustomAttribute): { href: string } | { id: string } {
  return attribute.href ? { href: attribute.href } : { id: attribute.id };
}

function postAction<T>(
  gateway: ApiGateway,
  entityPath: string,
  action: "add" | "edit" | "delete",
  resources: Record<string, unknown>[],
  decodeResult: (payload: unknown) => T,
): Promise<T> {
  return attempt(`${action} custom attributes`, async () =>
    decodeResult(await gateway.post(`${entityPath}/custom_attributes`, { action, resources })),
  );
}

/**
 * Adds missing attributes and edits the value of existing ones. Attributes
 * on the entity that are not requested are left alone.
 */
export async function convergeCustomAttributes(
  gateway: ApiGateway,
  request: CustomAttributeRequest,
  options: CustomAttributeOptions = {},
): Promise<CustomAttributeResult> {
  const label = `${request.entityName} ${request.entityType}`;
  const entityPath = await locateEntity(gateway, request.entityType, request.entityName);
  const current = await fetchCustomAttributes(gateway, entityPath);
  const diff = diffCustomAttributes(current, request.attributes);

  const remoteByKey = new Map(current.map((attribute) => [customAttributeKey(attribute), attribute]));
  const added = Object.values(diff.Added);
  const updated = Object.entries(diff.Updated).flatMap(([key, changes]) => {
    const existing = remoteByKey.get(key);
    if (!existing) return [];
    return [{ ...existing, value: changes.value ?? existing.value }];
  });

  if (added.length === 0 && updated.length === 0) {
    return {
      changed: false,
      msg: `Custom attributes of ${label} are already up to date`,
      updates: { Added: [], Updated: [] },
    };
  }

  if (options.dryRun) {
    return {
      changed: true,
      msg: `Would set the custom attributes of ${label}`,
      updates: { Added: added, Updated: updated },
    };
  }

  const addedResults =
    added.length > 0
      ? await postAction(
          gateway,
          entityPath,
          "add",
          added.map((attribute) => ({ name: attribute.name, section: attribute.section, value: attribute.value })),
          decodeActionResults,
        )
      : [];
  const updatedResults =
    updated.length > 0
      ? await postAction(
          gateway,
          entityPath,
          "edit",
          updated.map((attribute) => ({
            ...resourceRef(attribute),
            name: attribute.name,
            section: attribute.section,
            value: attribute.value,
          })),
          decodeActionResults,
        )
      : [];

  consola.info(`[${request.entityName}] Custom attributes: +${addedResults.length} ~${updatedResults.length}`);
  return {
    changed: true,
    msg: `Successfully set the custom attributes to ${label}`,
    updates: { Added: addedResults, Updated: updatedResults },
  };
}

/** Deletes only the named attributes; others on the entity are untouched. */
export async function deleteCustomAttributes(
  gateway: ApiGateway,
  request: CustomAttributeDeleteRequest,
  options: CustomAttributeOptions = {},
): Promise<CustomAttributeDeleteResult> {
  const label = `${request.entityName} ${request.entityType}`;
  const entityPath = await locateEntity(gateway, request.entityType, request.entityName);
  const current = await fetchCustomAttributes(gateway, entityPath);

  const requested = new Set(request.attributes.map(customAttributeKey));
  const toDelete = current.filter((attribute) => requested.has(customAttributeKey(attribute)));
  if (toDelete.length === 0) {
    return { changed: false, msg: `None of the requested custom attributes exist on ${label}`, deleted: [] };
  }

  const names = toDelete.map((attribute) => attribute.name).join(", ");
  if (options.dryRun) {
    return { changed: true, msg: `Would delete the following custom attributes from ${label}: ${names}`, deleted: toDelete };
  }

  const outcomes = await postAction(gateway, entityPath, "delete", toDelete.map(resourceRef), decodeActionOutcomes);
  const rejected = outcomes.filter((outcome) => !outcome.success);
  if (rejected.length > 0) {
    const reasons = rejected.map((outcome) => outcome.message || "request rejected").join("; ");
    throw new ReconcileError(`Failed to delete custom attributes from ${label}. Error: ${reasons}`);
  }
  consola.info(`[${request.entityName}] Deleted custom attributes: ${names}`);
  return {
    changed: true,
    msg: `Successfully deleted the following custom attributes from ${label}: ${names}`,
    deleted: toDelete,
  };
}
