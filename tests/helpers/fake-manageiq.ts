import type { ApiGateway, QueryParams } from "@/clients/manageiq-client";
import { ApiError } from "@/lib/errors";
import type { CollectionMember } from "@/lib/types";
import { z } from "zod/v4";

export interface RecordedCall {
  method: "GET" | "POST";
  path: string;
  query?: QueryParams;
  body?: Record<string, unknown>;
}

export interface FakeEndpoint {
  role: string;
  hostname: string | null;
  port: number | null;
}

export interface FakeProvider {
  id: string;
  name: string;
  type: string;
  zone_id: string;
  provider_region: string | null;
  endpoints: FakeEndpoint[];
}

export interface FakeAuthentication {
  authtype: string;
  status: string | null;
  status_details?: string;
  last_valid_on: string | null;
  last_invalid_on: string | null;
}

export interface FakeCustomAttribute {
  id: string;
  href?: string;
  name: string;
  section: string;
  value: string;
}

const ConnectionsBody = z.object({
  zone: z.object({ id: z.string() }),
  provider_region: z.string().nullable(),
  connection_configurations: z.array(
    z.object({
      endpoint: z.object({ role: z.string(), hostname: z.string().optional(), port: z.number().optional() }),
    }),
  ),
});

const CreateBody = ConnectionsBody.extend({ name: z.string(), type: z.string() });

const AttributeResources = z.array(
  z.object({
    id: z.string().optional(),
    href: z.string().optional(),
    name: z.string().optional(),
    section: z.string().optional(),
    value: z.string().optional(),
  }),
);

/**
 * In-process stand-in for the ManageIQ REST API. Records every call, serves
 * providers, zones, authentications and custom attributes from memory, and
 * applies writes so a second reconciliation sees the result of the first.
 */
export class FakeManageIq implements ApiGateway {
  readonly calls: RecordedCall[] = [];
  readonly providers = new Map<string, FakeProvider>();
  deleteResponse: Record<string, unknown> = { success: true, message: "Deleting provider", task_id: "9001" };
  /** When set, custom attribute deletes answer with these results and remove nothing. */
  attributeDeleteResults: Record<string, unknown>[] | null = null;

  #collections = new Map<string, CollectionMember[]>();
  #authentications = new Map<string, FakeAuthentication[][]>();
  #customAttributes = new Map<string, FakeCustomAttribute[]>();
  #failures = new Set<string>();
  #nextId = 1000;

  addZone(id: string, name: string): this {
    this.#member("zones").push({ id, name });
    return this;
  }

  addProvider(provider: FakeProvider): this {
    this.providers.set(provider.id, { ...provider, endpoints: provider.endpoints.map((e) => ({ ...e })) });
    this.#member("providers").push({ id: provider.id, name: provider.name });
    if (!this.#customAttributes.has(`/providers/${provider.id}`)) {
      this.#customAttributes.set(`/providers/${provider.id}`, []);
    }
    return this;
  }

  addEntity(collection: string, id: string, name: string, attributes: FakeCustomAttribute[] = []): this {
    this.#member(collection).push({ id, name });
    this.#customAttributes.set(`/${collection}/${id}`, attributes.map((a) => ({ ...a })));
    return this;
  }

  setCustomAttributes(entityPath: string, attributes: FakeCustomAttribute[]): this {
    this.#customAttributes.set(entityPath, attributes.map((a) => ({ ...a })));
    return this;
  }

  /** Successive authentication fetches return these snapshots in order; the last one repeats. */
  setAuthentications(providerId: string, ...snapshots: FakeAuthentication[][]): this {
    this.#authentications.set(providerId, snapshots);
    return this;
  }

  /** Makes `METHOD path` fail with an HTTP 500. */
  failOn(method: "GET" | "POST", path: string): this {
    this.#failures.add(`${method} ${path}`);
    return this;
  }

  customAttributesOf(entityPath: string): FakeCustomAttribute[] {
    return this.#customAttributes.get(entityPath) ?? [];
  }

  writes(): RecordedCall[] {
    return this.calls.filter((call) => call.method === "POST");
  }

  authenticationFetches(providerId: string): number {
    return this.calls.filter(
      (call) => call.path === `/providers/${providerId}` && call.query?.attributes === "authentications",
    ).length;
  }

  async listCollection(collection: string): Promise<CollectionMember[]> {
    this.#record({ method: "GET", path: `/${collection}` });
    return [...(this.#collections.get(collection) ?? [])];
  }

  async get(path: string, query?: QueryParams): Promise<unknown> {
    this.#record({ method: "GET", path, query });

    if (query?.expand === "custom_attributes") {
      const attributes = this.#customAttributes.get(path);
      if (!attributes) throw this.#notFound("GET", path);
      return { href: path, custom_attributes: attributes.map((a) => ({ ...a })) };
    }

    const provider = this.#provider("GET", path);
    if (query?.attributes === "authentications") {
      const snapshots = this.#authentications.get(provider.id) ?? [[]];
      const current = snapshots.length > 1 ? snapshots.shift() : snapshots[0];
      return { id: provider.id, name: provider.name, authentications: current ?? [] };
    }
    return {
      id: provider.id,
      name: provider.name,
      zone_id: provider.zone_id,
      provider_region: provider.provider_region,
      endpoints: provider.endpoints.map((e) => ({ ...e })),
    };
  }

  async post(path: string, body: Record<string, unknown>): Promise<unknown> {
    this.#record({ method: "POST", path, body });

    if (path === "/providers") {
      const create = CreateBody.parse(body);
      const id = String(this.#nextId++);
      this.addProvider({
        id,
        name: create.name,
        type: create.type,
        zone_id: create.zone.id,
        provider_region: create.provider_region,
        endpoints: this.#endpoints(create),
      });
      return { results: [{ id, name: create.name }] };
    }

    if (path.endsWith("/custom_attributes")) {
      return this.#attributeAction(path.slice(0, -"/custom_attributes".length), body);
    }

    const provider = this.#provider("POST", path);
    if (body.action === "edit") {
      const edit = ConnectionsBody.parse(body);
      provider.zone_id = edit.zone.id;
      provider.provider_region = edit.provider_region;
      provider.endpoints = this.#endpoints(edit);
      return { id: provider.id, name: provider.name };
    }
    if (body.action === "delete") {
      if (this.deleteResponse.success === true) {
        this.providers.delete(provider.id);
        const members = this.#member("providers");
        members.splice(members.findIndex((m) => m.id === provider.id), 1);
      }
      return this.deleteResponse;
    }
    throw new ApiError(`HTTP 400: unsupported action ${String(body.action)}`, "POST", path, 400);
  }

  #attributeAction(entityPath: string, body: Record<string, unknown>): unknown {
    const attributes = this.#customAttributes.get(entityPath);
    if (!attributes) throw this.#notFound("POST", entityPath);
    const resources = AttributeResources.parse(body.resources);
    const matches = (attribute: FakeCustomAttribute, ref: { id?: string; href?: string }) =>
      (ref.href !== undefined && attribute.href === ref.href) || (ref.id !== undefined && attribute.id === ref.id);

    if (body.action === "add") {
      const added = resources.map((resource) => {
        const id = String(this.#nextId++);
        const attribute: FakeCustomAttribute = {
          id,
          href: `${entityPath}/custom_attributes/${id}`,
          name: resource.name ?? "",
          section: resource.section ?? "metadata",
          value: resource.value ?? "",
        };
        attributes.push(attribute);
        return attribute;
      });
      return { results: added.map((a) => ({ ...a })) };
    }

    if (body.action === "edit") {
      const edited = resources.flatMap((resource) => {
        const attribute = attributes.find((a) => matches(a, resource));
        if (!attribute) return [];
        attribute.value = resource.value ?? attribute.value;
        return [{ ...attribute }];
      });
      return { results: edited };
    }

    if (body.action === "delete") {
      if (this.attributeDeleteResults) {
        return { results: this.attributeDeleteResults };
      }
      for (const resource of resources) {
        const index = attributes.findIndex((a) => matches(a, resource));
        if (index >= 0) attributes.splice(index, 1);
      }
      return { results: resources.map(() => ({ success: true, message: "custom attribute deleted" })) };
    }

    throw new ApiError(`HTTP 400: unsupported action ${String(body.action)}`, "POST", entityPath, 400);
  }

  #endpoints(body: z.output<typeof ConnectionsBody>): FakeEndpoint[] {
    return body.connection_configurations.map(({ endpoint }) => ({
      role: endpoint.role,
      hostname: endpoint.hostname ?? null,
      port: endpoint.port ?? null,
    }));
  }

  #record(call: RecordedCall): void {
    this.calls.push(call);
    if (this.#failures.has(`${call.method} ${call.path}`)) {
      throw new ApiError("HTTP 500: Internal Server Error", call.method, call.path, 500);
    }
  }

  #member(collection: string): CollectionMember[] {
    let members = this.#collections.get(collection);
    if (!members) {
      members = [];
      this.#collections.set(collection, members);
    }
    return members;
  }

  #provider(method: string, path: string): FakeProvider {
    const match = /^\/providers\/([^/]+)$/.exec(path);
    const provider = match?.[1] ? this.providers.get(match[1]) : undefined;
    if (!provider) throw this.#notFound(method, path);
    return provider;
  }

  #notFound(method: string, path: string): ApiError {
    return new ApiError("HTTP 404: Couldn't find resource", method, path, 404);
  }
}
