import type { RecordChange, ToxicologyRecord } from "@toxedit/contracts";
import diff, { type Difference } from "microdiff";
import { formatPointer } from "./json-patch.js";

function toRecordChange(difference: Difference): RecordChange {
  const path = formatPointer(difference.path);
  switch (difference.type) {
    case "CREATE":
      return { type: "add", path, new: difference.value };
    case "REMOVE":
      return { type: "remove", path, old: difference.oldValue };
    case "CHANGE":
      return { type: "change", path, old: difference.oldValue, new: difference.value };
  }
}

/**
 * Structural diff between two record snapshots. Objects are compared key by
 * key and arrays index by index, so an insertion mid-list shows up as a run
 * of changes followed by one add.
 */
export function diffRecords(before: ToxicologyRecord, after: ToxicologyRecord): RecordChange[] {
  return diff(before, after).map(toRecordChange);
}
