import { customAttributeKey } from "@/core/diff";
import { DEFAULT_SECTION, ENTITY_TYPES, OPENSHIFT_DEFAULT_PORT } from "@/lib/constants";
import { z } from "zod/v4";

// ============ Schema ============

const UrlSchema = z.url();
const NonEmptyString = z.string().trim().min(1);
const PortSchema = z.coerce.number().int().min(1).max(65535);
const StateSchema = z.enum(["present", "absent"]).default("present");

export const ManageIqSchema = z.object({
  url: UrlSchema,
  username: NonEmptyString,
  password: NonEmptyString,
  verifySsl: z.boolean().default(true),
  caBundlePath: NonEmptyString.optional(),
});

const MetricsSchema = z
  .discriminatedUnion("enabled", [
    z.object({ enabled: z.literal(false) }),
    z.object({
      enabled: z.literal(true),
      hostname: NonEmptyString,
      port: PortSchema,
    }),
  ])
  .default({ enabled: false });

const ProviderCommonSchema = z.object({
  name: NonEmptyString,
  state: StateSchema,
  zone: NonEmptyString.optional(),
});

const OpenshiftFields = {
  hostname: NonEmptyString,
  port: PortSchema.default(OPENSHIFT_DEFAULT_PORT),
  authToken: NonEmptyString,
  region: NonEmptyString.optional(),
  metrics: MetricsSchema,
};

const OpenshiftOriginSchema = ProviderCommonSchema.extend({
  type: z.literal("openshift-origin"),
  ...OpenshiftFields,
});

const OpenshiftEnterpriseSchema = ProviderCommonSchema.extend({
  type: z.literal("openshift-enterprise"),
  ...OpenshiftFields,
});

const AmazonSchema = ProviderCommonSchema.extend({
  type: z.literal("amazon"),
  region: NonEmptyString,
  accessKeyId: NonEmptyString,
  secretAccessKey: NonEmptyString,
});

export const ProviderSchema = z.discriminatedUnion("type", [
  OpenshiftOriginSchema,
  OpenshiftEnterpriseSchema,
  AmazonSchema,
]);

const CustomAttributeSchema = z.object({
  name: NonEmptyString,
  value: z.string().default(""),
  section: NonEmptyString.default(DEFAULT_SECTION),
});

const EntityTypeSchema = z.enum(ENTITY_TYPES);

export const CustomAttributeTargetSchema = z
  .object({
    entityType: EntityTypeSchema.default("provider"),
    entityName: NonEmptyString,
    state: StateSchema,
    attributes: z.array(CustomAttributeSchema).min(1),
  })
  .superRefine((target, ctx) => {
    const seen = new Set<string>();
    for (const [index, attribute] of target.attributes.entries()) {
      const key = customAttributeKey(attribute);
      if (seen.has(key)) {
        ctx.addIssue({
          code: "custom",
          path: ["attributes", index, "name"],
          message: `duplicate custom attribute: ${attribute.name} in section ${attribute.section}`,
        });
      }
      seen.add(key);
    }
  });

export const ConfigSchema = z
  .object({
    manageiq: ManageIqSchema,
    providers: z.array(ProviderSchema).default([]),
    customAttributes: z.array(CustomAttributeTargetSchema).default([]),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    for (const [index, provider] of config.providers.entries()) {
      if (seen.has(provider.name)) {
        ctx.addIssue({
          code: "custom",
          path: ["providers", index, "name"],
          message: `duplicate provider name: ${provider.name}`,
        });
      }
      seen.add(provider.name);
    }
  });

export type AppConfig = z.output<typeof ConfigSchema>;
export type ProviderConfig = AppConfig["providers"][number];
export type OpenshiftProviderConfig = Extract<ProviderConfig, { type: "openshift-origin" | "openshift-enterprise" }>;
export type AmazonProviderConfig = Extract<ProviderConfig, { type: "amazon" }>;
export type CustomAttributeTargetConfig = AppConfig["customAttributes"][number];
