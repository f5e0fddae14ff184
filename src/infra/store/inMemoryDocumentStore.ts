import {
  emptyProductTypeCounts,
  type DocumentDraft,
  type DocumentEntity,
  type ProductType,
} from "../../core/entities/document";
import type {
  DocumentStorePort,
  IdGeneratorPort,
  StoreSearchQuery,
  StoreSearchResult,
  UpsertResult,
} from "../../core/ports/outboundPorts";
import { isUuid } from "../system/systemPorts";

const TITLE_WEIGHT = 10;
const BODY_WEIGHT = 1;

const tokenize = (text: string): string[] =>
  text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];

const countOccurrences = (tokens: string[], term: string): number =>
  tokens.reduce((count, token) => (token === term ? count + 1 : count), 0);

type IndexedDocument = {
  document: DocumentEntity;
  titleTokens: string[];
  bodyTokens: string[];
};

/**
 * Process-local document store for development runs and tests.
 * Search requires every query term to occur in the title or body and ranks title hits above body hits.
 */
export class InMemoryDocumentStore implements DocumentStorePort {
  private readonly byId = new Map<string, IndexedDocument>();
  private readonly idBySourceUrl = new Map<string, string>();

  constructor(private readonly ids: IdGeneratorPort) {}

  async upsert(draft: DocumentDraft): Promise<UpsertResult> {
    const existingId = this.idBySourceUrl.get(draft.sourceUrl);
    const id = existingId ?? this.ids.next();
    const document: DocumentEntity = { id, ...structuredClone(draft) };

    this.byId.set(id, {
      document,
      titleTokens: tokenize(document.title),
      bodyTokens: tokenize(document.bodyText),
    });
    this.idBySourceUrl.set(document.sourceUrl, id);

    return { document: structuredClone(document), created: !existingId };
  }

  async findById(id: string): Promise<DocumentEntity | null> {
    const indexed = this.byId.get(id);
    return indexed ? structuredClone(indexed.document) : null;
  }

  isValidId(id: string): boolean {
    return isUuid(id);
  }

  async search(query: StoreSearchQuery): Promise<StoreSearchResult> {
    const terms = query.text ? Array.from(new Set(tokenize(query.text))) : [];
    // Text without a single indexable token matches nothing, like an empty tsquery.
    if (query.text && terms.length === 0) {
      return { items: [], total: 0 };
    }

    const ranked = Array.from(this.byId.values())
      .filter(
        (entry) =>
          !query.productType || entry.document.productType === query.productType,
      )
      .map((entry) => ({
        entry,
        score: terms.reduce(
          (score, term) =>
            score +
            TITLE_WEIGHT * countOccurrences(entry.titleTokens, term) +
            BODY_WEIGHT * countOccurrences(entry.bodyTokens, term),
          0,
        ),
        matchesAll: terms.every(
          (term) =>
            entry.titleTokens.includes(term) || entry.bodyTokens.includes(term),
        ),
      }))
      .filter((candidate) => candidate.matchesAll)
      .sort(
        (left, right) =>
          right.score - left.score ||
          right.entry.document.fetchedAt.getTime() -
            left.entry.document.fetchedAt.getTime() ||
          left.entry.document.id.localeCompare(right.entry.document.id),
      );

    return {
      items: ranked
        .slice(query.offset, query.offset + query.limit)
        .map((candidate) => structuredClone(candidate.entry.document)),
      total: ranked.length,
    };
  }

  async countByProductType(): Promise<Record<ProductType, number>> {
    const counts = emptyProductTypeCounts();
    for (const { document } of this.byId.values()) {
      counts[document.productType] += 1;
    }
    return counts;
  }

  async latestFetchedAt(): Promise<Date | null> {
    let latest: Date | null = null;
    for (const { document } of this.byId.values()) {
      if (!latest || document.fetchedAt.getTime() > latest.getTime()) {
        latest = document.fetchedAt;
      }
    }
    return latest ? new Date(latest.getTime()) : null;
  }

  async ping(): Promise<boolean> {
    return true;
  }

  size(): number {
    return this.byId.size;
  }
}
