import type { CanonicalDate, DateBucket, DatedRecord, SourceKind } from "./types.js";

export function groupByDate<K extends SourceKind>(records: ReadonlyArray<DatedRecord<K>>): DateBucket<K> {
  const bucket: DateBucket<K> = new Map();
  for (const record of records) {
    const existing = bucket.get(record.date);
    if (existing) {
      existing.push(record.payload);
    } else {
      bucket.set(record.date, [record.payload]);
    }
  }
  return bucket;
}

export function sortedDates<K extends SourceKind>(bucket: DateBucket<K>): CanonicalDate[] {
  return [...bucket.keys()].sort();
}
