import type { AppConfig, CustomAttributeTargetConfig, ProviderConfig } from "@/config/schema";
import { ManageIqClient, type ApiGateway } from "@/clients/manageiq-client";
import { convergeCustomAttributes, deleteCustomAttributes } from "@/core/custom-attributes";
import { buildConnections, providerRegion } from "@/core/endpoints";
import { convergeProvider, deleteProvider, type ProviderRequest } from "@/core/provider";
import type { ItemAction, ItemKind, ItemReport, ItemResult, RunResult } from "@/core/types";
import type { ValidationPollOptions } from "@/core/validation";
import { ApiError, ReconcileError } from "@/lib/errors";
import { consola } from "consola";

export interface RunOptions {
  dryRun?: boolean;
  /** Deletes every configured item regardless of its `state`. */
  deleteAll?: boolean;
  validation?: ValidationPollOptions;
  /** Injected gateway; a ManageIqClient is connected from config otherwise. */
  gateway?: ApiGateway;
}

export function providerRequest(provider: ProviderConfig): ProviderRequest {
  return {
    name: provider.name,
    type: provider.type,
    connections: buildConnections(provider),
    zone: provider.zone,
    region: providerRegion(provider),
  };
}

async function runItem(
  kind: ItemKind,
  name: string,
  action: ItemAction,
  fn: () => Promise<ItemResult>,
): Promise<ItemReport> {
  consola.info(`[${name}] ${action === "delete" ? "Deleting" : "Reconciling"} ${kind}`);
  try {
    const result = await fn();
    return { kind, name, action, changed: result.changed, failed: false, msg: result.msg, result };
  } catch (error) {
    if (!(error instanceof ReconcileError) && !(error instanceof ApiError)) throw error;
    return { kind, name, action, changed: false, failed: true, msg: error.message, result: null };
  }
}

function actionOf(item: { state: "present" | "absent" }, options: RunOptions): ItemAction {
  return options.deleteAll || item.state === "absent" ? "delete" : "apply";
}

function reconcileProvider(gateway: ApiGateway, provider: ProviderConfig, options: RunOptions) {
  const action = actionOf(provider, options);
  return runItem("provider", provider.name, action, () =>
    action === "delete"
      ? deleteProvider(gateway, provider.name, { dryRun: options.dryRun })
      : convergeProvider(gateway, providerRequest(provider), {
          dryRun: options.dryRun,
          validation: options.validation,
        }),
  );
}

function reconcileCustomAttributes(gateway: ApiGateway, target: CustomAttributeTargetConfig, options: RunOptions) {
  const action = actionOf(target, options);
  const request = {
    entityType: target.entityType,
    entityName: target.entityName,
    attributes: target.attributes,
  };
  return runItem("custom-attributes", target.entityName, action, () =>
    action === "delete"
      ? deleteCustomAttributes(gateway, request, { dryRun: options.dryRun })
      : convergeCustomAttributes(gateway, request, { dryRun: options.dryRun }),
  );
}

/**
 * Runs custom attribute deletes, then every configured provider, then the
 * remaining custom attribute entries, one after the other. Attribute deletes
 * go first so a provider deleted in the same run can still be found. A fatal
 * error fails its item and the run moves on.
 */
export async function runReconcile(config: AppConfig, options: RunOptions = {}): Promise<RunResult> {
  const start = Date.now();
  let client: ManageIqClient | undefined;
  let gateway: ApiGateway;
  if (options.gateway) {
    gateway = options.gateway;
  } else {
    client = await ManageIqClient.connect(config.manageiq);
    gateway = client;
  }

  const items: ItemReport[] = [];
  try {
    const attributeDeletes = config.customAttributes.filter((target) => actionOf(target, options) === "delete");
    for (const target of attributeDeletes) {
      items.push(await reconcileCustomAttributes(gateway, target, options));
    }
    for (const provider of config.providers) {
      items.push(await reconcileProvider(gateway, provider, options));
    }
    for (const target of config.customAttributes) {
      if (actionOf(target, options) === "apply") {
        items.push(await reconcileCustomAttributes(gateway, target, options));
      }
    }
  } finally {
    await client?.close();
  }

  return {
    success: items.every((item) => !item.failed),
    dryRun: options.dryRun ?? false,
    items,
    elapsedMs: Date.now() - start,
  };
}
