import { type Static, type TSchema, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { CatalogRecord, CatalogValue } from "../photo/tags/types.js";
import type { CatalogApi, CatalogConnection } from "./types.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { CatalogError } from "./errors.js";

const log = createSubsystemLogger("catalog");

const PagedResultsSchema = Type.Object({
  count: Type.Integer({ minimum: 0 }),
  results: Type.Array(Type.Unknown()),
});

const NegativeSchema = Type.Object({
  slug: Type.String({ minLength: 1 }),
});

const CreatedScanSchema = Type.Object({
  uuid: Type.String({ minLength: 1 }),
});

function isCatalogValue(value: unknown): value is CatalogValue {
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "boolean" ||
    (typeof value === "number" && Number.isFinite(value))
  ) {
    return true;
  }
  if (Array.isArray(value)) {
    return value.every(isCatalogValue);
  }
  return isCatalogRecord(value);
}

export function isCatalogRecord(value: unknown): value is CatalogRecord {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  return Object.values(value).every(isCatalogValue);
}

type RequestInput = {
  method: "GET" | "POST";
  path: string;
  query?: Record<string, string>;
  form?: Record<string, string>;
};

export type CatalogClientOptions = {
  fetchImpl?: typeof fetch;
};

/**
 * HTTP client for the catalog API. Every call fails fast with a CatalogError;
 * there are no retries.
 */
export function createCatalogClient(
  connection: CatalogConnection,
  options: CatalogClientOptions = {},
): CatalogApi {
  const fetchImpl = options.fetchImpl ?? fetch;
  const baseUrl = connection.server.trim().replace(/\/+$/, "");
  const authorization = `Basic ${Buffer.from(
    `${connection.username}:${connection.password}`,
  ).toString("base64")}`;

  async function send(input: RequestInput): Promise<Response> {
    const url = new URL(`${baseUrl}${input.path}`);
    for (const [key, value] of Object.entries(input.query ?? {})) {
      url.searchParams.set(key, value);
    }
    log.debug(`${input.method} ${url.toString()}`);
    try {
      return await fetchImpl(url, {
        method: input.method,
        headers: {
          Accept: "application/json",
          Authorization: authorization,
        },
        body: input.form ? new URLSearchParams(input.form) : undefined,
      });
    } catch (err) {
      throw new CatalogError(
        "network",
        `Cannot reach ${baseUrl}: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      );
    }
  }

  async function requestJson<T extends TSchema>(
    input: RequestInput,
    schema: T,
  ): Promise<Static<T>> {
    const res = await send(input);
    if (!res.ok) {
      throw errorForStatus(res.status, `${input.method} ${input.path}`);
    }
    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      throw new CatalogError("invalid_response", `${input.path} did not return JSON`, {
        status: res.status,
        cause: err,
      });
    }
    if (!Value.Check(schema, body)) {
      throw new CatalogError("invalid_response", `Unexpected response shape from ${input.path}`, {
        status: res.status,
      });
    }
    return body;
  }

  /** Lookups must match exactly one record. */
  async function findOne(
    path: string,
    query: Record<string, string>,
    what: string,
  ): Promise<unknown> {
    const page = await requestJson({ method: "GET", path, query }, PagedResultsSchema);
    if (page.count !== 1 || page.results.length !== 1) {
      throw new CatalogError(
        "not_found",
        `Expected one ${what}, catalog returned ${page.count}`,
      );
    }
    return page.results[0];
  }

  return {
    async testCredentials() {
      const res = await send({ method: "GET", path: "/camera" });
      return res.status === 200;
    },

    async resolveNegative(film, frame) {
      const result = await findOne(
        "/negative/",
        { film, frame },
        `negative for film ${film} frame ${frame}`,
      );
      if (!Value.Check(NegativeSchema, result)) {
        throw new CatalogError("invalid_response", "Negative record has no slug");
      }
      return result.slug;
    },

    async createScan(negative, filename, date) {
      const created = await requestJson(
        { method: "POST", path: "/scan/", form: { negative, filename, date } },
        CreatedScanSchema,
      );
      return created.uuid;
    },

    async fetchScan(scanId) {
      const result = await findOne("/scan/", { uuid: scanId }, `scan ${scanId}`);
      if (!isCatalogRecord(result)) {
        throw new CatalogError("invalid_response", `Scan ${scanId} is not an object`);
      }
      return result;
    },
  };
}

function errorForStatus(status: number, what: string): CatalogError {
  if (status === 401 || status === 403) {
    return new CatalogError("unauthorized", `${what}: not authorized (HTTP ${status})`, {
      status,
    });
  }
  if (status === 404) {
    return new CatalogError("not_found", `${what}: not found (HTTP 404)`, { status });
  }
  if (status >= 400 && status < 500) {
    return new CatalogError("validation", `${what}: rejected (HTTP ${status})`, { status });
  }
  return new CatalogError("server", `${what}: server error (HTTP ${status})`, { status });
}
