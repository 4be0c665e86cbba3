/**
 * manageiq-reconcile - declarative provider and custom attribute reconciliation for ManageIQ
 */

export { runReconcile, providerRequest } from "@/core/run";
export { convergeProvider, deleteProvider, formatValidationDetails } from "@/core/provider";
export { convergeCustomAttributes, deleteCustomAttributes } from "@/core/custom-attributes";
export { awaitValidation, fetchValidationSnapshot } from "@/core/validation";
export { diffKeyed, diffCustomAttributes, providerRequiredUpdates } from "@/core/diff";
export { findByName } from "@/core/locator";
export { buildConnections } from "@/core/endpoints";
export { loadConfig, parseConfig } from "@/config/loader";
export { ManageIqClient } from "@/clients/manageiq-client";
export { ApiError, ConfigError, ReconcileError } from "@/lib/errors";

export type { ApiGateway } from "@/clients/manageiq-client";
export type { AppConfig, ProviderConfig, CustomAttributeTargetConfig } from "@/config/schema";
export type { ProviderRequest, ConvergeOptions } from "@/core/provider";
export type { CustomAttributeRequest, CustomAttributeDeleteRequest } from "@/core/custom-attributes";
export type { RunOptions } from "@/core/run";
export type { ItemReport, RunResult } from "@/core/types";
export type {
  ConnectionConfiguration,
  CustomAttribute,
  CustomAttributeDeleteResult,
  CustomAttributeResult,
  KeyedDiff,
  ProviderDeleteResult,
  ProviderResult,
  ProviderUpdates,
  ValidationOutcome,
  ValidationRecord,
} from "@/lib/types";
