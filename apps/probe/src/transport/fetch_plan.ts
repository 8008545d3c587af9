// Two-round fetch: fixed identifiers first, then the table rows their counts call for.

import type { RawValueV1, ValueStoreV1 } from "@upsmon/contracts";
import { PHASE_ONE_OIDS_V1, buildPhaseTwoOidsV1, readLineCountsV1 } from "@upsmon/status-kernel";

import type { ProbeLogger } from "../logger";
import type { UpsValueSourceV1 } from "./types";

// Keeps each GET well under the usual 1472-byte UDP payload.
export const MAX_OIDS_PER_REQUEST = 40;

export function chunkOidsV1(oids: ReadonlyArray<string>, size: number = MAX_OIDS_PER_REQUEST): string[][] {
  const out: string[][] = [];
  for (let i = 0; i < oids.length; i += size) out.push(oids.slice(i, i + size));
  return out;
}

async function fetchInto(
  source: UpsValueSourceV1,
  oids: ReadonlyArray<string>,
  store: Map<string, RawValueV1>,
  logger: ProbeLogger,
  round: string
): Promise<void> {
  const batches = chunkOidsV1(oids);
  logger.debug({ round, oids: oids.length, batches: batches.length }, "fetching");
  for (const batch of batches) {
    const values = await source.fetch(batch); // Sequential: one request in flight per agent.
    for (const [oid, value] of values) store.set(oid, value);
  }
}

export async function fetchUpsValuesV1(source: UpsValueSourceV1, logger: ProbeLogger): Promise<ValueStoreV1> {
  const store = new Map<string, RawValueV1>();

  await fetchInto(source, PHASE_ONE_OIDS_V1, store, logger, "scalars");
  const counts = readLineCountsV1(store);
  logger.debug({ counts }, "table sizes");

  await fetchInto(source, buildPhaseTwoOidsV1(counts), store, logger, "tables");
  return store;
}
