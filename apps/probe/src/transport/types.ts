import type { ValueStoreV1 } from "@upsmon/contracts";

/**
 * Something that can answer GET requests for a list of identifiers.
 *
 * Identifiers the agent does not know are simply absent from the result;
 * transport-level failures reject with a ProbeDataError.
 */
export interface UpsValueSourceV1 {
  fetch(oids: ReadonlyArray<string>): Promise<ValueStoreV1>;
  close(): void;
}
