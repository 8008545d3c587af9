// Status Kernel - field accessor
//
// The single choke point through which evaluators read the value store.
// A mandatory field that is absent or malformed aborts the whole evaluation:
// no report is produced from partial data.

import type { RawValueV1, ValueStoreV1 } from "@upsmon/contracts";

import { ProbeDataError } from "../errors";
import type { FieldParser } from "./field_parsers";

export class FieldAccessorV1 {
  constructor(private readonly store: ValueStoreV1) {}

  /**
   * Reads and validates a mandatory field.
   */
  get<T>(oid: string, parser: FieldParser<T>, description: string): T {
    const raw = this.store.get(oid);
    if (raw === undefined) {
      throw new ProbeDataError("FIELD_MISSING", `${description} @ ${oid}`);
    }
    return this.parse(oid, raw, parser, description);
  }

  /**
   * Reads a field that may be absent; a present but malformed value is still fatal.
   */
  optional<T>(oid: string, parser: FieldParser<T>, description: string): T | undefined {
    const raw = this.store.get(oid);
    if (raw === undefined) return undefined;
    return this.parse(oid, raw, parser, description);
  }

  private parse<T>(oid: string, raw: RawValueV1, parser: FieldParser<T>, description: string): T {
    const result = parser(raw);
    if (!result.ok) {
      throw new ProbeDataError("FIELD_INVALID", `${description} @ ${oid}: ${result.reason} (got ${JSON.stringify(raw)})`);
    }
    return result.value;
  }
}
