/**
 * packages/core/src/state/diff.ts — Differences between two snapshots.
 *
 * Component ids are compared by key: present only in `after` = added, only in
 * `before` = removed, in both with any field deep-unequal = changed. Id
 * lists are sorted so output is stable.
 */

import { pathEquals, pathToString } from "./focusPath.js";
import {
  COMPONENT_FIELDS,
  type ComponentField,
  type Snapshot,
  deepEqualUnknown,
  getComponent,
} from "./snapshot.js";

export type StateDiff = Readonly<{
  added: readonly string[];
  removed: readonly string[];
  changed: readonly string[];
  changedFields: Readonly<Record<string, readonly ComponentField[]>>;
  focusChanged: boolean;
  modalsChanged: boolean;
}>;

export const EMPTY_DIFF: StateDiff = Object.freeze({
  added: Object.freeze([]),
  removed: Object.freeze([]),
  changed: Object.freeze([]),
  changedFields: Object.freeze({}),
  focusChanged: false,
  modalsChanged: false,
});

export function computeDiff(before: Snapshot, after: Snapshot): StateDiff {
  const added: string[] = [];
  const removed: string[] = [];
  const changed: string[] = [];
  const changedFields: Record<string, readonly ComponentField[]> = {};

  for (const [id, next] of Object.entries(after.components)) {
    const prev = getComponent(before, id);
    if (prev === undefined) {
      added.push(id);
      continue;
    }
    const fields = COMPONENT_FIELDS.filter((f) => !deepEqualUnknown(prev[f], next[f]));
    if (fields.length > 0) {
      changed.push(id);
      changedFields[id] = Object.freeze(fields);
    }
  }
  for (const id of Object.keys(before.components)) {
    if (getComponent(after, id) === undefined) removed.push(id);
  }

  return Object.freeze({
    added: Object.freeze(added.sort()),
    removed: Object.freeze(removed.sort()),
    changed: Object.freeze(changed.sort()),
    changedFields: Object.freeze(changedFields),
    focusChanged: !pathEquals(before.focusPath, after.focusPath),
    modalsChanged: !deepEqualUnknown(before.modals, after.modals),
  });
}

export function hasChanges(d: StateDiff): boolean {
  return (
    d.added.length > 0 ||
    d.removed.length > 0 ||
    d.changed.length > 0 ||
    d.focusChanged ||
    d.modalsChanged
  );
}

/**
 * One line per change:
 *   + id
 *   - id
 *   ~ id: field, field
 *   focus: a.b -> a.c
 */
export function formatDiff(d: StateDiff, before?: Snapshot, after?: Snapshot): string {
  const lines: string[] = [];
  for (const id of d.added) lines.push(`+ ${id}`);
  for (const id of d.removed) lines.push(`- ${id}`);
  for (const id of d.changed) lines.push(`~ ${id}: ${(d.changedFields[id] ?? []).join(", ")}`);
  if (d.focusChanged) {
    lines.push(
      before !== undefined && after !== undefined
        ? `focus: ${pathToString(before.focusPath)} -> ${pathToString(after.focusPath)}`
        : "focus changed",
    );
  }
  if (d.modalsChanged) lines.push("modals changed");
  return lines.join("\n");
}
