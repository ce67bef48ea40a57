import type { FetchOutcome } from "./retry.js";
import type { RunContext } from "./run-context.js";
import type { Domain, EntityKind } from "../../types/canonical.js";
import type { RawSourceRecord } from "../../types/raw.js";

// ============================================================================
// Fetch Collaborators
// ============================================================================

export interface FetchPageRequest {
  since: Date;
  /** Opaque position returned by the previous page; null on the first page */
  cursor: string | null;
  pageSize: number;
  ctx: RunContext;
}

export interface PageFetcher {
  fetchPage(request: FetchPageRequest): Promise<FetchOutcome<RawSourceRecord>>;
}

// ============================================================================
// Jobs
// ============================================================================

/** One fetchable entity of a source */
export interface SourceStream {
  entity: EntityKind;
  /** Short label for logs, e.g. the address a stream covers */
  label?: string;
  fetcher: PageFetcher;
}

export interface SourceJob {
  source: string;
  domain: Domain;
  streams: SourceStream[];
  /** Set when the source cannot run, e.g. missing credentials */
  unusableReason?: string;
}
