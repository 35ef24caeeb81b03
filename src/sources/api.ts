import type { ApiEndpoint } from "../config.js";
import type { CanonicalDate, DatedRecord, RecordPayloads, SourceKind } from "../journal/types.js";
import { errorMessage } from "../logger.js";
import { HttpStatusError, MalformedBodyError, getJson, type HttpOptions } from "./http.js";
import { sourceFailure, type RecordSource, type SourceOutcome } from "./types.js";

export type ParsedItems<T> =
  | { ok: true; items: T[]; dropped: number }
  | { ok: false; message: string };

export type ApiSourceOptions<K extends SourceKind> = {
  kind: K;
  name: string;
  api: ApiEndpoint | null;
  http: HttpOptions;
  /** Journal day every record of this fetch is filed under. */
  journalDate: CanonicalDate;
  parse: (json: unknown) => ParsedItems<RecordPayloads[K]>;
};

/**
 * A source backed by one JSON GET. API payloads describe "now", so all
 * records share the configured journal date.
 */
export function createApiSource<K extends SourceKind>(opts: ApiSourceOptions<K>): RecordSource<K> {
  return {
    kind: opts.kind,
    name: opts.name,
    async collect(): Promise<SourceOutcome<K>> {
      if (!opts.api) {
        return sourceFailure("not_configured", `${opts.name} endpoint or key is not configured`);
      }

      let json: unknown;
      try {
        json = await getJson(opts.api, opts.http);
      } catch (err) {
        if (err instanceof MalformedBodyError) {
          return sourceFailure("malformed", `${opts.name}: ${err.message}`);
        }
        const detail = err instanceof HttpStatusError ? `HTTP ${err.status}` : errorMessage(err);
        return sourceFailure("unavailable", `${opts.name} request failed: ${detail}`);
      }

      const parsed = opts.parse(json);
      if (!parsed.ok) return sourceFailure("malformed", `${opts.name}: ${parsed.message}`);

      const records = parsed.items.map(
        (payload): DatedRecord<K> => ({ date: opts.journalDate, kind: opts.kind, payload })
      );
      return { ok: true, records, dropped: parsed.dropped };
    }
  };
}
