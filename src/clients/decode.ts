import { DEFAULT_SECTION } from "@/lib/constants";
import type {
  CollectionMember,
  DeleteResponse,
  RemoteCustomAttribute,
  RemoteProvider,
  ResourceId,
  ValidationSnapshot,
} from "@/lib/types";
import { formatZodError } from "@/lib/zod-issues";
import { z } from "zod/v4";

// ManageIQ returns ids as numeric strings on current releases and as numbers on older ones.
const IdSchema = z.union([z.string().min(1), z.number().int()]).transform(String);
const OptionalId = IdSchema.nullish().transform((value) => value ?? null);
const OptionalString = z.string().nullish().transform((value) => value ?? null);

const CollectionPageSchema = z.object({
  resources: z
    .array(z.object({ id: IdSchema, name: OptionalString }))
    .default([]),
});

const RemoteEndpointSchema = z.object({
  role: z.string(),
  hostname: OptionalString,
  port: z.number().int().nullish().transform((value) => value ?? null),
});

const RemoteProviderSchema = z.object({
  id: IdSchema,
  name: OptionalString,
  zone_id: OptionalId,
  // An unset region comes back as "" on some provider types
  provider_region: z.string().nullish().transform((value) => value || null),
  endpoints: z.array(RemoteEndpointSchema).default([]),
});

const AuthenticationsSchema = z.object({
  authentications: z
    .array(
      z.object({
        authtype: OptionalString,
        status: OptionalString,
        status_details: OptionalString,
        last_valid_on: OptionalString,
        last_invalid_on: OptionalString,
      }),
    )
    .default([]),
});

const RemoteCustomAttributeSchema = z.object({
  id: IdSchema,
  href: OptionalString,
  name: z.string(),
  section: z.string().nullish().transform((value) => value ?? DEFAULT_SECTION),
  value: z.string().nullish().transform((value) => value ?? ""),
});

const CustomAttributesSchema = z.object({
  custom_attributes: z.array(RemoteCustomAttributeSchema).default([]),
});

const ActionResultsSchema = z.object({
  results: z.array(RemoteCustomAttributeSchema).default([]),
});

const ActionOutcomesSchema = z.object({
  results: z
    .array(z.object({ success: z.boolean(), message: z.string().nullish().transform((value) => value ?? "") }))
    .default([]),
});

const CreateResultSchema = z.object({
  results: z.array(z.object({ id: IdSchema })).min(1),
});

const DeleteResponseSchema = z.object({
  success: z.boolean(),
  message: z.string().default(""),
  task_id: OptionalId,
});

function decode<S extends z.ZodType>(schema: S, payload: unknown, what: string): z.output<S> {
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    throw new Error(`Unexpected ${what} response:\n${formatZodError(parsed.error)}`);
  }
  return parsed.data;
}

export function decodeCollectionPage(payload: unknown): CollectionMember[] {
  return decode(CollectionPageSchema, payload, "collection").resources;
}

export function decodeProvider(payload: unknown): RemoteProvider {
  return decode(RemoteProviderSchema, payload, "provider");
}

export function decodeValidationSnapshot(payload: unknown): ValidationSnapshot {
  const { authentications } = decode(AuthenticationsSchema, payload, "authentications");
  const snapshot: ValidationSnapshot = {};
  for (const auth of authentications) {
    if (!auth.authtype) continue;
    snapshot[auth.authtype] = {
      authtype: auth.authtype,
      status: auth.status,
      status_details: auth.status_details ?? "",
      last_valid_on: auth.last_valid_on,
      last_invalid_on: auth.last_invalid_on,
    };
  }
  return snapshot;
}

export function decodeCustomAttributes(payload: unknown): RemoteCustomAttribute[] {
  return decode(CustomAttributesSchema, payload, "custom attributes").custom_attributes;
}

export function decodeActionResults(payload: unknown): RemoteCustomAttribute[] {
  return decode(ActionResultsSchema, payload, "custom attribute action").results;
}

export function decodeActionOutcomes(payload: unknown): { success: boolean; message: string }[] {
  return decode(ActionOutcomesSchema, payload, "action").results;
}

export function decodeCreatedId(payload: unknown): ResourceId {
  const { results } = decode(CreateResultSchema, payload, "create");
  const [first] = results;
  if (!first) throw new Error("Create response carried no results");
  return first.id;
}

export function decodeDeleteResponse(payload: unknown): DeleteResponse {
  return decode(DeleteResponseSchema, payload, "delete");
}
