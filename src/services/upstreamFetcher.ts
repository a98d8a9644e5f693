import type { ResourceRecordMap } from "../domain/records.js";
import type { ResourceType } from "../domain/resourceTypes.js";
import type { NotionClient } from "../infra/notion/notionClient.js";
import { notionPageSchema } from "../infra/notion/properties.js";
import { PermanentFetchError, TransientFetchError, type UpstreamFetchError } from "../models/errorCodes.js";
import { getAppLogger, type AppLogger } from "../logging/logger.js";
import { RESOURCE_SOURCES, type ResourceSource, type ResourceSourceMap } from "./resourceSources.js";

export const DEFAULT_MAX_PAGES = 500;

export type FetchResult<T extends ResourceType> =
  | { ok: true; records: ResourceRecordMap[T][]; pages: number }
  | { ok: false; error: UpstreamFetchError };

/** Retrieves the complete current record set for a type, or a classified failure. */
export interface UpstreamFetcher {
  fetchAll<T extends ResourceType>(resourceType: T): Promise<FetchResult<T>>;
}

export interface NotionUpstreamFetcherOptions {
  databaseIds: Record<ResourceType, string | undefined>;
  sources?: ResourceSourceMap;
  maxPages?: number;
  logger?: AppLogger;
}

export class NotionUpstreamFetcher implements UpstreamFetcher {
  private readonly sources: ResourceSourceMap;
  private readonly maxPages: number;
  private readonly logger: AppLogger;

  constructor(private readonly client: NotionClient, private readonly options: NotionUpstreamFetcherOptions) {
    this.sources = options.sources ?? RESOURCE_SOURCES;
    this.maxPages = Math.max(1, options.maxPages ?? DEFAULT_MAX_PAGES);
    const rootLogger = options.logger ?? getAppLogger();
    this.logger = rootLogger.child?.({ module: "upstreamFetcher" }) ?? rootLogger;
  }

  async fetchAll<T extends ResourceType>(resourceType: T): Promise<FetchResult<T>> {
    try {
      const { records, pages } = await this.paginate(resourceType, this.sources[resourceType]);
      this.logger.info?.({ resourceType, pages, recordCount: records.length }, "upstream.fetch_complete");
      return { ok: true, records, pages };
    } catch (error) {
      if (error instanceof TransientFetchError || error instanceof PermanentFetchError) {
        this.logger.warn?.(
          { resourceType, kind: error.kind, cause: error.upstream.cause, message: error.message },
          "upstream.fetch_failed"
        );
        return { ok: false, error };
      }
      throw error;
    }
  }

  private async paginate<T extends ResourceType>(
    resourceType: T,
    source: ResourceSource<T>
  ): Promise<{ records: ResourceRecordMap[T][]; pages: number }> {
    const databaseId = this.options.databaseIds[resourceType];
    if (!databaseId) {
      throw new PermanentFetchError(`No upstream dataset is configured for ${resourceType}`, {
        cause: "missing_dataset_id"
      });
    }

    const records: ResourceRecordMap[T][] = [];
    const seen = new Set<string>();
    let cursor: string | null = null;
    let pages = 0;

    do {
      if (pages >= this.maxPages) {
        throw new PermanentFetchError(`Pagination exceeded ${this.maxPages} pages for ${resourceType}`, {
          cause: "page_limit_exceeded"
        });
      }

      const response = await this.client.queryDatabase(databaseId, {
        filter: source.filter,
        startCursor: cursor
      });
      pages += 1;

      for (const raw of response.results) {
        const page = notionPageSchema.safeParse(raw);
        if (!page.success) {
          throw new PermanentFetchError(`Upstream page for ${resourceType} has an unexpected shape`, {
            cause: "unexpected_shape"
          });
        }
        const record = source.parse(page.data);
        if (source.dedupeKey) {
          const key = source.dedupeKey(record);
          if (seen.has(key)) {
            continue;
          }
          seen.add(key);
        }
        records.push(record);
      }

      this.logger.debug?.({ resourceType, page: pages, received: response.results.length }, "upstream.page_fetched");

      if (response.has_more && !response.next_cursor) {
        throw new PermanentFetchError(`Upstream reported more ${resourceType} without a cursor`, {
          cause: "unexpected_shape"
        });
      }
      cursor = response.has_more ? response.next_cursor : null;
    } while (cursor);

    return { records, pages };
  }
}
