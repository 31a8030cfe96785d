/**
 * Qdrant vector DB client for episodic-memory
 * Uses Qdrant REST API directly (no SDK dependency)
 */

import { Type, type TSchema, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { StoreError, type StoreOperation } from "./errors.js";

/**
 * Per-user collection name. This is the persisted naming contract: changing it
 * orphans every stored episode.
 */
export function collectionName(prefix: string, userId: string): string {
  return `${prefix}_${userId}`;
}

export interface QdrantPoint {
  id: string;
  vector: number[];
  payload: Record<string, unknown>;
}

const PointId = Type.Union([Type.String(), Type.Number()]);
const Payload = Type.Union([Type.Record(Type.String(), Type.Unknown()), Type.Null()]);

const SearchResponse = Type.Object({
  result: Type.Array(
    Type.Object({
      id: PointId,
      score: Type.Number(),
      payload: Type.Optional(Payload),
    }),
  ),
});

const ScrollResponse = Type.Object({
  result: Type.Object({
    points: Type.Array(
      Type.Object({
        id: PointId,
        payload: Type.Optional(Payload),
      }),
    ),
  }),
});

export interface QdrantHit {
  id: string;
  score: number;
  payload: Record<string, unknown>;
}

export interface QdrantRecord {
  id: string;
  payload: Record<string, unknown>;
}

/** Full-text match on one payload field, as used by scroll. */
export interface TextFilter {
  key: string;
  text: string;
}

export class QdrantClient {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;

  constructor(url: string, apiKey?: string) {
    this.baseUrl = url.replace(/\/$/, "");
    this.headers = {
      "Content-Type": "application/json",
      ...(apiKey ? { "api-key": apiKey } : {}),
    };
  }

  private async request(
    operation: StoreOperation,
    path: string,
    init: { method: string; body?: unknown },
  ): Promise<Response> {
    try {
      return await fetch(`${this.baseUrl}${path}`, {
        method: init.method,
        headers: this.headers,
        body: init.body === undefined ? undefined : JSON.stringify(init.body),
      });
    } catch (err) {
      throw new StoreError(operation, `Qdrant ${operation} request failed: ${String(err)}`, {
        cause: err,
      });
    }
  }

  private async fail(operation: StoreOperation, res: Response): Promise<never> {
    const body = await res.text();
    throw new StoreError(operation, `Qdrant ${operation} failed (${res.status}): ${body}`, {
      status: res.status,
      body,
    });
  }

  private async parse<T extends TSchema>(
    operation: StoreOperation,
    res: Response,
    schema: T,
  ): Promise<Static<T>> {
    const body = await res.text();
    let data: unknown;
    try {
      data = JSON.parse(body);
    } catch (err) {
      throw new StoreError(operation, `Qdrant ${operation} returned invalid JSON`, {
        status: res.status,
        body,
        cause: err,
      });
    }
    if (!Value.Check(schema, data)) {
      throw new StoreError(operation, `Qdrant ${operation} returned an unexpected response`, {
        status: res.status,
        body,
      });
    }
    return data;
  }

  private path(collection: string, suffix = ""): string {
    return `/collections/${encodeURIComponent(collection)}${suffix}`;
  }

  // --------------------------------------------------------------------------
  // Collection management
  // --------------------------------------------------------------------------

  async collectionExists(collection: string): Promise<boolean> {
    const res = await this.request("exists", this.path(collection), { method: "GET" });
    if (res.ok) return true;
    if (res.status === 404) return false;
    return this.fail("exists", res);
  }

  async createCollection(collection: string, vectorSize: number): Promise<void> {
    const res = await this.request("create", this.path(collection), {
      method: "PUT",
      body: {
        vectors: {
          size: vectorSize,
          distance: "Cosine",
        },
      },
    });

    // 409: another writer created it first
    if (res.ok || res.status === 409) return;
    await this.fail("create", res);
  }

  async createTextIndex(collection: string, field: string): Promise<void> {
    const res = await this.request("index", this.path(collection, "/index?wait=true"), {
      method: "PUT",
      body: {
        field_name: field,
        field_schema: "text",
      },
    });

    if (!res.ok) await this.fail("index", res);
  }

  // --------------------------------------------------------------------------
  // Upsert
  // --------------------------------------------------------------------------

  async upsert(collection: string, points: QdrantPoint[]): Promise<void> {
    const res = await this.request("upsert", this.path(collection, "/points?wait=true"), {
      method: "PUT",
      body: { points },
    });

    if (!res.ok) await this.fail("upsert", res);
  }

  // --------------------------------------------------------------------------
  // Search
  // --------------------------------------------------------------------------

  async search(collection: string, vector: number[], limit: number): Promise<QdrantHit[]> {
    const res = await this.request("search", this.path(collection, "/points/search"), {
      method: "POST",
      body: {
        vector,
        limit,
        with_payload: true,
      },
    });

    if (!res.ok) return this.fail("search", res);

    const data = await this.parse("search", res, SearchResponse);
    return data.result.map((hit) => ({
      id: String(hit.id),
      score: hit.score,
      payload: hit.payload ?? {},
    }));
  }

  // --------------------------------------------------------------------------
  // Scroll (filtered scan, no ranking)
  // --------------------------------------------------------------------------

  async scroll(collection: string, filter: TextFilter, limit: number): Promise<QdrantRecord[]> {
    const res = await this.request("scroll", this.path(collection, "/points/scroll"), {
      method: "POST",
      body: {
        filter: {
          must: [{ key: filter.key, match: { text: filter.text } }],
        },
        limit,
        with_payload: true,
        with_vector: false,
      },
    });

    if (!res.ok) return this.fail("scroll", res);

    const data = await this.parse("scroll", res, ScrollResponse);
    return data.result.points.map((point) => ({
      id: String(point.id),
      payload: point.payload ?? {},
    }));
  }
}
