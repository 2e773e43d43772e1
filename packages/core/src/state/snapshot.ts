/**
 * packages/core/src/state/snapshot.ts — Point-in-time UI state.
 *
 * Why: Undo, diffing and automation queries all need a copy of the UI that
 * later edits cannot reach. Snapshots are deep-frozen on creation; every
 * change produces a new snapshot instead of editing one in place.
 */

import { isRecord } from "../actions/payload.js";
import { EMPTY_FOCUS_PATH, type FocusPath, pathEquals } from "./focusPath.js";

export type Rect = Readonly<{ x: number; y: number; width: number; height: number }>;

export const ZERO_RECT: Rect = Object.freeze({ x: 0, y: 0, width: 0, height: 0 });

export type CellRef = Readonly<{ x: number; y: number }>;

export type DirtyRegion = Readonly<{ cells: readonly CellRef[]; rects: readonly Rect[] }>;

export const EMPTY_DIRTY: DirtyRegion = Object.freeze({ cells: Object.freeze([]), rects: Object.freeze([]) });

export type ModalType = "dialog" | "alert" | "confirm" | "menu";

export type ModalState = Readonly<{
  id: string;
  type: ModalType;
  /** Component focused inside the modal. */
  focus: string;
  open: boolean;
  closable: boolean;
}>;

export type ComponentState = Readonly<{
  id: string;
  type: string;
  /** Static configuration. */
  props: Readonly<Record<string, unknown>>;
  /** Runtime values (text, checked, selection, ...). */
  state: Readonly<Record<string, unknown>>;
  rect: Rect;
  visible: boolean;
  disabled: boolean;
}>;

export type Snapshot = Readonly<{
  /** ms since epoch. */
  timestamp: number;
  focusPath: FocusPath;
  components: Readonly<Record<string, ComponentState>>;
  modals: readonly ModalState[];
  dirty: DirtyRegion;
  metadata: Readonly<Record<string, unknown>>;
}>;

export type ComponentField = Exclude<keyof ComponentState, "id">;

export const COMPONENT_FIELDS: readonly ComponentField[] = Object.freeze([
  "type",
  "props",
  "state",
  "rect",
  "visible",
  "disabled",
]);

/* ---------- Immutability ---------- */

export function deepFreeze<T>(value: T): T {
  if (typeof value !== "object" || value === null || Object.isFrozen(value)) return value;
  Object.freeze(value);
  if (Array.isArray(value)) {
    for (const item of value) deepFreeze(item);
  } else if (isRecord(value)) {
    for (const key of Object.keys(value)) deepFreeze(value[key]);
  }
  return value;
}

/**
 * Data part of a value. Functions and symbols are dropped at any depth: object
 * keys holding them go away, array slots become `undefined`. Dates, regexps,
 * errors and binary buffers pass through for `structuredClone` to copy.
 */
export function dataValue(value: unknown, seen: WeakMap<object, unknown> = new WeakMap()): unknown {
  if (typeof value === "function" || typeof value === "symbol") return undefined;
  if (typeof value !== "object" || value === null) return value;
  if (
    value instanceof Date ||
    value instanceof RegExp ||
    value instanceof Error ||
    value instanceof ArrayBuffer ||
    ArrayBuffer.isView(value)
  ) {
    return value;
  }
  const known = seen.get(value);
  if (known !== undefined) return known;

  if (Array.isArray(value)) {
    const out: unknown[] = [];
    seen.set(value, out);
    for (const item of value) out.push(dataValue(item, seen));
    return out;
  }
  if (value instanceof Map) {
    const out = new Map<unknown, unknown>();
    seen.set(value, out);
    for (const [k, v] of value) {
      if (isCallable(k) || isCallable(v)) continue;
      out.set(dataValue(k, seen), dataValue(v, seen));
    }
    return out;
  }
  if (value instanceof Set) {
    const out = new Set<unknown>();
    seen.set(value, out);
    for (const item of value) {
      if (!isCallable(item)) out.add(dataValue(item, seen));
    }
    return out;
  }
  const out: Record<string, unknown> = {};
  seen.set(value, out);
  for (const [key, v] of Object.entries(value)) {
    if (!isCallable(v)) out[key] = dataValue(v, seen);
  }
  return out;
}

function isCallable(v: unknown): boolean {
  return typeof v === "function" || typeof v === "symbol";
}

/** Record form of {@link dataValue}. */
export function dataOnly(record: Readonly<Record<string, unknown>>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  const seen = new WeakMap<object, unknown>([[record, out]]);
  for (const [key, v] of Object.entries(record)) {
    if (!isCallable(v)) out[key] = dataValue(v, seen);
  }
  return out;
}

/**
 * Independent deep copy, frozen. Functions fail loudly; the constructors below
 * pass props, state and metadata through {@link dataOnly} first.
 */
export function deepCopy<T>(value: T): T {
  return deepFreeze(structuredClone(value));
}

export function deepEqualUnknown(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (typeof a !== typeof b) return false;
  if (typeof a === "number" && typeof b === "number") return Number.isNaN(a) && Number.isNaN(b);
  if (typeof a !== "object" || a === null || b === null) return false;

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b)) return false;
    if (a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
      if (!deepEqualUnknown(a[i], b[i])) return false;
    }
    return true;
  }

  if (!isRecord(a) || !isRecord(b)) return false;
  const tag = Object.prototype.toString.call(a);
  if (tag !== Object.prototype.toString.call(b)) return false;
  if (a instanceof Date && b instanceof Date) return Object.is(a.getTime(), b.getTime());
  if (a instanceof RegExp && b instanceof RegExp) return String(a) === String(b);
  if (a instanceof Map && b instanceof Map) {
    if (a.size !== b.size) return false;
    for (const [key, value] of a) {
      if (!b.has(key) || !deepEqualUnknown(value, b.get(key))) return false;
    }
    return true;
  }
  if (a instanceof Set && b instanceof Set) {
    if (a.size !== b.size) return false;
    const rest = [...b];
    for (const item of a) {
      if (b.has(item)) continue;
      if (!rest.some((other) => deepEqualUnknown(item, other))) return false;
    }
    return true;
  }

  const aKeys = Object.keys(a);
  const bKeys = Object.keys(b);
  if (aKeys.length !== bKeys.length) return false;
  for (const key of aKeys) {
    if (!Object.prototype.hasOwnProperty.call(b, key)) return false;
    if (!deepEqualUnknown(a[key], b[key])) return false;
  }
  return true;
}

/* ---------- Construction ---------- */

export type ComponentInit = Readonly<{
  type?: string;
  props?: Readonly<Record<string, unknown>>;
  state?: Readonly<Record<string, unknown>>;
  rect?: Rect;
  visible?: boolean;
  disabled?: boolean;
}>;

export function createComponentState(id: string, init: ComponentInit = {}): ComponentState {
  return deepCopy({
    id,
    type: init.type ?? "",
    props: dataOnly(init.props ?? {}),
    state: dataOnly(init.state ?? {}),
    rect: init.rect ?? ZERO_RECT,
    visible: init.visible ?? true,
    disabled: init.disabled ?? false,
  });
}

export type SnapshotInit = Readonly<{
  timestamp?: number;
  focusPath?: FocusPath;
  components?: readonly ComponentState[];
  modals?: readonly ModalState[];
  dirty?: DirtyRegion;
  metadata?: Readonly<Record<string, unknown>>;
}>;

export function createSnapshot(init: SnapshotInit = {}): Snapshot {
  const components: Record<string, ComponentState> = {};
  for (const c of init.components ?? []) components[c.id] = createComponentState(c.id, c);
  return deepCopy({
    timestamp: init.timestamp ?? Date.now(),
    focusPath: init.focusPath ?? EMPTY_FOCUS_PATH,
    components,
    modals: init.modals ?? [],
    dirty: init.dirty ?? EMPTY_DIRTY,
    metadata: dataOnly(init.metadata ?? {}),
  });
}

/* ---------- Queries ---------- */

export function getComponent(s: Snapshot, id: string): ComponentState | undefined {
  return Object.prototype.hasOwnProperty.call(s.components, id) ? s.components[id] : undefined;
}

export function componentIds(s: Snapshot): readonly string[] {
  return Object.keys(s.components);
}

export function componentsEqual(a: ComponentState, b: ComponentState): boolean {
  if (a.id !== b.id) return false;
  for (const field of COMPONENT_FIELDS) {
    if (!deepEqualUnknown(a[field], b[field])) return false;
  }
  return true;
}

/**
 * Same UI state. Timestamp and dirty regions are bookkeeping and do not
 * take part.
 */
export function snapshotsEqual(a: Snapshot, b: Snapshot): boolean {
  if (a === b) return true;
  if (!pathEquals(a.focusPath, b.focusPath)) return false;
  const aIds = componentIds(a);
  if (aIds.length !== componentIds(b).length) return false;
  for (const id of aIds) {
    const ac = a.components[id];
    const bc = getComponent(b, id);
    if (ac === undefined || bc === undefined || !componentsEqual(ac, bc)) return false;
  }
  return deepEqualUnknown(a.modals, b.modals) && deepEqualUnknown(a.metadata, b.metadata);
}

/* ---------- Copy-on-write updates ---------- */

export function withComponent(s: Snapshot, c: ComponentState, timestamp: number = s.timestamp): Snapshot {
  return Object.freeze({
    ...s,
    timestamp,
    components: Object.freeze({ ...s.components, [c.id]: createComponentState(c.id, c) }),
  });
}

export function withoutComponent(s: Snapshot, id: string, timestamp: number = s.timestamp): Snapshot {
  const components: Record<string, ComponentState> = {};
  for (const [key, c] of Object.entries(s.components)) {
    if (key !== id) components[key] = c;
  }
  return Object.freeze({ ...s, timestamp, components: Object.freeze(components) });
}

export function withFocusPath(s: Snapshot, path: FocusPath, timestamp: number = s.timestamp): Snapshot {
  return Object.freeze({ ...s, timestamp, focusPath: Object.freeze([...path]) });
}

export function withModals(
  s: Snapshot,
  modals: readonly ModalState[],
  timestamp: number = s.timestamp,
): Snapshot {
  return Object.freeze({ ...s, timestamp, modals: deepCopy([...modals]) });
}

export function withMetadata(s: Snapshot, key: string, value: unknown, timestamp: number = s.timestamp): Snapshot {
  return Object.freeze({
    ...s,
    timestamp,
    metadata: Object.freeze({ ...s.metadata, [key]: deepCopy(dataValue(value)) }),
  });
}

export function withDirty(s: Snapshot, dirty: DirtyRegion, timestamp: number = s.timestamp): Snapshot {
  return Object.freeze({ ...s, timestamp, dirty: deepCopy(dirty) });
}
