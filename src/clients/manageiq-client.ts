import { decodeCollectionPage } from "@/clients/decode";
import { PAGINATION } from "@/lib/constants";
import { requestJson } from "@/lib/http";
import type { CollectionMember, ManageIqConfig } from "@/lib/types";
import { consola } from "consola";
import { readFile } from "node:fs/promises";
import { Agent, type Dispatcher } from "undici";

export type QueryParams = Record<string, string | number>;

/**
 * The management API as the reconcilers see it. Payloads stay `unknown`
 * until they are decoded into records at the boundary.
 */
export interface ApiGateway {
  get(path: string, query?: QueryParams): Promise<unknown>;
  post(path: string, body: Record<string, unknown>): Promise<unknown>;
  listCollection(collection: string): Promise<CollectionMember[]>;
}

export class ManageIqClient implements ApiGateway {
  private config: ManageIqConfig;
  private dispatcher?: Dispatcher;

  constructor(config: ManageIqConfig, dispatcher?: Dispatcher) {
    this.config = {
      ...config,
      url: config.url.replace(/\/$/, ""),
    };
    this.dispatcher = dispatcher;
  }

  /**
   * Builds a client whose TLS settings follow `verifySsl` and `caBundlePath`.
   */
  static async connect(config: ManageIqConfig): Promise<ManageIqClient> {
    if (config.verifySsl && !config.caBundlePath) {
      return new ManageIqClient(config);
    }
    const ca = config.caBundlePath ? await readFile(config.caBundlePath, "utf8") : undefined;
    const agent = new Agent({
      connect: { rejectUnauthorized: config.verifySsl, ca },
    });
    return new ManageIqClient(config, agent);
  }

  private get headers(): Record<string, string> {
    const credentials = Buffer.from(`${this.config.username}:${this.config.password}`).toString("base64");
    return {
      Authorization: `Basic ${credentials}`,
      Accept: "application/json",
      "Content-Type": "application/json",
    };
  }

  private get baseUrl(): string {
    return `${this.config.url}/api`;
  }

  async get(path: string, query?: QueryParams): Promise<unknown> {
    consola.debug(`GET ${path}`);
    return requestJson<unknown>(`${this.baseUrl}${path}`, {
      headers: this.headers,
      query,
      dispatcher: this.dispatcher,
    });
  }

  async post(path: string, body: Record<string, unknown>): Promise<unknown> {
    consola.debug(`POST ${path}${typeof body.action === "string" ? ` (${body.action})` : ""}`);
    return requestJson<unknown>(`${this.baseUrl}${path}`, {
      method: "POST",
      headers: this.headers,
      body,
      dispatcher: this.dispatcher,
    });
  }

  async listCollection(collection: string): Promise<CollectionMember[]> {
    const all: CollectionMember[] = [];
    let offset = 0;
    while (true) {
      const page = decodeCollectionPage(
        await this.get(`/${collection}`, {
          expand: "resources",
          attributes: "name",
          offset,
          limit: PAGINATION.DEFAULT_PAGE_SIZE,
        }),
      );
      all.push(...page);
      if (page.length < PAGINATION.DEFAULT_PAGE_SIZE) break;
      offset += page.length;
    }
    return all;
  }

  /** Releases the TLS agent, if one was created. */
  async close(): Promise<void> {
    await this.dispatcher?.close();
  }
}
