/**
 * Centralized constants for the reconciler.
 */

// Collection paging used by the entity locator
export const PAGINATION = {
  DEFAULT_PAGE_SIZE: 100,
} as const;

// Timeout configuration (milliseconds)
export const TIMEOUTS = {
  REQUEST_MS: 30_000,
} as const;

// Authentication validation polling
export const VALIDATION = {
  ITERATIONS: 10,
  WAIT_MS: 5_000,
  ALL_VALID: "All Valid",
  IN_PROGRESS: "Validation in progress",
} as const;

export const DEFAULT_ZONE = "default";
export const DEFAULT_SECTION = "metadata";
export const OPENSHIFT_DEFAULT_PORT = 8443;

// Provider types and the ManageIQ class each one is created as
export const PROVIDER_TYPES = {
  "openshift-origin": "ManageIQ::Providers::Openshift::ContainerManager",
  "openshift-enterprise": "ManageIQ::Providers::OpenshiftEnterprise::ContainerManager",
  amazon: "ManageIQ::Providers::Amazon::CloudManager",
} as const;

export type ProviderType = keyof typeof PROVIDER_TYPES;

// Entity types that carry custom attributes, and their API collection
export const ENTITY_TYPES = ["provider", "vm", "host", "service"] as const;

export type EntityType = (typeof ENTITY_TYPES)[number];

export const ENTITY_COLLECTIONS: Record<EntityType, string> = {
  provider: "providers",
  vm: "vms",
  host: "hosts",
  service: "services",
};

export const ENDPOINT_ROLES = {
  DEFAULT: "default",
  HAWKULAR: "hawkular",
} as const;

export const AUTH_TYPES = {
  BEARER: "bearer",
  HAWKULAR: "hawkular",
  DEFAULT: "default",
} as const;
