import type { ApiGateway } from "@/clients/manageiq-client";
import { decodeCreatedId, decodeDeleteResponse, decodeProvider } from "@/clients/decode";
import { providerRequiredUpdates, rolesWithChanges, type DesiredProviderState } from "@/core/diff";
import { findProviderByName, findZoneByName } from "@/core/locator";
import { awaitValidation, fetchValidationSnapshot, type ValidationPollOptions } from "@/core/validation";
import { DEFAULT_ZONE, PROVIDER_TYPES, type ProviderType } from "@/lib/constants";
import { attempt, ReconcileError } from "@/lib/errors";
import type {
  ConnectionConfiguration,
  ProviderDeleteResult,
  ProviderResult,
  RemoteProvider,
  ResourceId,
  ValidationOutcome,
  ValidationSnapshot,
} from "@/lib/types";
import { consola } from "consola";

export interface ProviderRequest {
  name: string;
  type: ProviderType;
  connections: ConnectionConfiguration[];
  zone?: string;
  region: string | null;
}

export interface ConvergeOptions {
  dryRun?: boolean;
  validation?: ValidationPollOptions;
}

type Operation = "addition" | "update";

export function formatValidationDetails(details: ValidationOutcome["details"]): string {
  if (typeof details === "string") return details;
  return Object.entries(details)
    .map(([authtype, [status, statusDetails]]) =>
      statusDetails ? `${authtype}: ${status} (${statusDetails})` : `${authtype}: ${status}`,
    )
    .join(", ");
}

function fetchProvider(gateway: ApiGateway, providerId: ResourceId): Promise<RemoteProvider> {
  return attempt("get provider data", async () =>
    decodeProvider(await gateway.get(`/providers/${providerId}`, { attributes: "endpoints" })),
  );
}

function writePayload(desired: DesiredProviderState): Record<string, unknown> {
  return {
    zone: { id: desired.zoneId },
    connection_configurations: desired.connections,
    provider_region: desired.region,
  };
}

/** Validates the authtypes of the changed roles and composes the result message. */
async function verify(
  gateway: ApiGateway,
  request: ProviderRequest,
  providerId: ResourceId,
  prior: ValidationSnapshot,
  roles: Set<string>,
  operation: Operation,
  options: ConvergeOptions,
): Promise<string> {
  const authtypes = request.connections
    .filter((connection) => roles.has(connection.endpoint.role))
    .map((connection) => connection.authentication.authtype);

  consola.info(`[${request.name}] Waiting for authentication validation: ${authtypes.join(", ") || "none"}`);
  const validation = await awaitValidation(gateway, providerId, prior, authtypes, options.validation);
  const details = formatValidationDetails(validation.details);

  if (validation.success) {
    return `Successful ${operation} of ${request.name} provider. Authentication: ${details}`;
  }
  consola.warn(`[${request.name}] Authentication validation did not pass: ${details}`);
  return `Failed to validate provider ${request.name} after ${operation}. Authentication: ${details}`;
}

async function addProvider(
  gateway: ApiGateway,
  request: ProviderRequest,
  desired: DesiredProviderState,
  options: ConvergeOptions,
): Promise<ProviderResult> {
  if (options.dryRun) {
    return { provider_id: null, changed: true, msg: `Would add ${request.name} provider`, updates: null };
  }

  const providerId = await attempt("add provider", async () =>
    decodeCreatedId(
      await gateway.post("/providers", {
        name: request.name,
        type: PROVIDER_TYPES[request.type],
        ...writePayload(desired),
      }),
    ),
  );
  consola.info(`[${request.name}] Added provider ${providerId}`);

  const roles = new Set(request.connections.map((connection) => connection.endpoint.role));
  const msg = await verify(gateway, request, providerId, {}, roles, "addition", options);
  return { provider_id: providerId, changed: true, msg, updates: null };
}

async function updateProvider(
  gateway: ApiGateway,
  request: ProviderRequest,
  providerId: ResourceId,
  desired: DesiredProviderState,
  options: ConvergeOptions,
): Promise<ProviderResult> {
  const current = await fetchProvider(gateway, providerId);
  const updates = providerRequiredUpdates(current, desired);
  if (!updates) {
    return { changed: false, msg: `Provider ${request.name} already exists` };
  }
  if (options.dryRun) {
    return { provider_id: providerId, changed: true, msg: `Would update ${request.name} provider`, updates };
  }

  const prior = await fetchValidationSnapshot(gateway, providerId);
  await attempt("update provider", () =>
    gateway.post(`/providers/${providerId}`, { action: "edit", ...writePayload(desired) }),
  );
  consola.info(`[${request.name}] Updated provider ${providerId}`);

  const msg = await verify(gateway, request, providerId, prior, rolesWithChanges(updates), "update", options);
  return { provider_id: providerId, changed: true, msg, updates };
}

/**
 * Adds the provider when no provider carries its name, otherwise edits it in
 * place when endpoints, zone or region differ. Changed credentials are
 * validated before returning.
 */
export async function convergeProvider(
  gateway: ApiGateway,
  request: ProviderRequest,
  options: ConvergeOptions = {},
): Promise<ProviderResult> {
  const zoneName = request.zone ?? DEFAULT_ZONE;
  const zoneId = await attempt("find zone", () => findZoneByName(gateway, zoneName));
  if (zoneId === null) {
    throw new ReconcileError(`Zone ${zoneName} doesn't exist`);
  }

  const desired: DesiredProviderState = {
    connections: request.connections,
    zoneId,
    region: request.region,
  };

  const providerId = await attempt("find provider", () => findProviderByName(gateway, request.name));
  if (providerId === null) {
    return addProvider(gateway, request, desired, options);
  }
  return updateProvider(gateway, request, providerId, desired, options);
}

export async function deleteProvider(
  gateway: ApiGateway,
  name: string,
  options: Pick<ConvergeOptions, "dryRun"> = {},
): Promise<ProviderDeleteResult> {
  const providerId = await attempt("find provider", () => findProviderByName(gateway, name));
  if (providerId === null) {
    return { task_id: null, changed: false, msg: `Provider ${name} doesn't exist` };
  }
  if (options.dryRun) {
    return { task_id: null, changed: true, msg: `Would delete ${name} provider` };
  }

  const response = await attempt(`delete ${name} provider`, async () =>
    decodeDeleteResponse(await gateway.post(`/providers/${providerId}`, { action: "delete" })),
  );
  if (!response.success) {
    throw new ReconcileError(`Failed to delete ${name} provider. Error: ${response.message || "request rejected"}`);
  }
  consola.info(`[${name}] Deleted provider ${providerId}`);
  return { task_id: response.task_id, changed: true, msg: response.message };
}
