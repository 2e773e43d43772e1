/**
 * packages/core/src/state/serialize.ts — Snapshot documents.
 *
 * Two forms:
 *   - the document form mirrors Snapshot field for field (serializeSnapshot)
 *   - the record form is flattened for introspection: focus path as a
 *     dotted string, component ids as keys, empty dirty/metadata omitted
 *
 * Reading either form validates every field and reports the first bad path.
 */

import { isRecord } from "../actions/payload.js";
import { type Result, TermlineError, err, ok } from "../errors.js";
import { type FocusPath, pathToString } from "./focusPath.js";
import {
  type CellRef,
  type ComponentState,
  type DirtyRegion,
  EMPTY_DIRTY,
  type ModalState,
  type ModalType,
  type Rect,
  type Snapshot,
  createSnapshot,
  deepCopy,
} from "./snapshot.js";

type Parsed<T> = Result<T, TermlineError>;

function bad(path: string, expected: string): Parsed<never> {
  return err(new TermlineError("SERIALIZE_ERROR", `${path}: expected ${expected}`));
}

function readNumber(v: unknown, path: string): Parsed<number> {
  return typeof v === "number" && Number.isFinite(v) ? ok(v) : bad(path, "a finite number");
}

function readString(v: unknown, path: string): Parsed<string> {
  return typeof v === "string" ? ok(v) : bad(path, "a string");
}

function readBoolean(v: unknown, path: string): Parsed<boolean> {
  return typeof v === "boolean" ? ok(v) : bad(path, "a boolean");
}

function readRecord(v: unknown, path: string): Parsed<Readonly<Record<string, unknown>>> {
  return isRecord(v) ? ok(v) : bad(path, "an object");
}

function readArray<T>(
  v: unknown,
  path: string,
  item: (x: unknown, p: string) => Parsed<T>,
): Parsed<readonly T[]> {
  if (!Array.isArray(v)) return bad(path, "an array");
  const out: T[] = [];
  for (let i = 0; i < v.length; i++) {
    const r = item(v[i], `${path}[${i}]`);
    if (!r.ok) return r;
    out.push(r.value);
  }
  return ok(out);
}

function readRect(v: unknown, path: string): Parsed<Rect> {
  const rec = readRecord(v, path);
  if (!rec.ok) return rec;
  const x = readNumber(rec.value["x"], `${path}.x`);
  if (!x.ok) return x;
  const y = readNumber(rec.value["y"], `${path}.y`);
  if (!y.ok) return y;
  const width = readNumber(rec.value["width"], `${path}.width`);
  if (!width.ok) return width;
  const height = readNumber(rec.value["height"], `${path}.height`);
  if (!height.ok) return height;
  return ok({ x: x.value, y: y.value, width: width.value, height: height.value });
}

function readCell(v: unknown, path: string): Parsed<CellRef> {
  const rec = readRecord(v, path);
  if (!rec.ok) return rec;
  const x = readNumber(rec.value["x"], `${path}.x`);
  if (!x.ok) return x;
  const y = readNumber(rec.value["y"], `${path}.y`);
  if (!y.ok) return y;
  return ok({ x: x.value, y: y.value });
}

const MODAL_TYPES: readonly ModalType[] = ["dialog", "alert", "confirm", "menu"];

function readModal(v: unknown, path: string): Parsed<ModalState> {
  const rec = readRecord(v, path);
  if (!rec.ok) return rec;
  const id = readString(rec.value["id"], `${path}.id`);
  if (!id.ok) return id;
  const type = MODAL_TYPES.find((t) => t === rec.value["type"]);
  if (type === undefined) return bad(`${path}.type`, `one of ${MODAL_TYPES.join("|")}`);
  const focus = readString(rec.value["focus"], `${path}.focus`);
  if (!focus.ok) return focus;
  const open = readBoolean(rec.value["open"], `${path}.open`);
  if (!open.ok) return open;
  const closable = readBoolean(rec.value["closable"], `${path}.closable`);
  if (!closable.ok) return closable;
  return ok({ id: id.value, type, focus: focus.value, open: open.value, closable: closable.value });
}

function readDirty(v: unknown, path: string): Parsed<DirtyRegion> {
  if (v === undefined) return ok(EMPTY_DIRTY);
  const rec = readRecord(v, path);
  if (!rec.ok) return rec;
  const cells = readArray(rec.value["cells"] ?? [], `${path}.cells`, readCell);
  if (!cells.ok) return cells;
  const rects = readArray(rec.value["rects"] ?? [], `${path}.rects`, readRect);
  if (!rects.ok) return rects;
  return ok({ cells: cells.value, rects: rects.value });
}

/** `id` comes from the enclosing key; an embedded id must agree with it. */
function readComponent(v: unknown, path: string, id: string): Parsed<ComponentState> {
  const rec = readRecord(v, path);
  if (!rec.ok) return rec;
  const r = rec.value;
  if (r["id"] !== undefined && r["id"] !== id) return bad(`${path}.id`, `"${id}"`);
  const type = readString(r["type"], `${path}.type`);
  if (!type.ok) return type;
  const props = readRecord(r["props"] ?? {}, `${path}.props`);
  if (!props.ok) return props;
  const state = readRecord(r["state"] ?? {}, `${path}.state`);
  if (!state.ok) return state;
  const rect = readRect(r["rect"], `${path}.rect`);
  if (!rect.ok) return rect;
  const visible = readBoolean(r["visible"], `${path}.visible`);
  if (!visible.ok) return visible;
  const disabled = readBoolean(r["disabled"], `${path}.disabled`);
  if (!disabled.ok) return disabled;
  return ok({
    id,
    type: type.value,
    props: props.value,
    state: state.value,
    rect: rect.value,
    visible: visible.value,
    disabled: disabled.value,
  });
}

function readComponents(v: unknown, path: string): Parsed<readonly ComponentState[]> {
  const rec = readRecord(v, path);
  if (!rec.ok) return rec;
  const out: ComponentState[] = [];
  for (const [id, c] of Object.entries(rec.value)) {
    const parsed = readComponent(c, `${path}.${id}`, id);
    if (!parsed.ok) return parsed;
    out.push(parsed.value);
  }
  return ok(out);
}

type CommonFields = Readonly<{
  timestamp: number;
  components: readonly ComponentState[];
  modals: readonly ModalState[];
  dirty: DirtyRegion;
  metadata: Readonly<Record<string, unknown>>;
}>;

function readCommon(doc: Readonly<Record<string, unknown>>): Parsed<CommonFields> {
  const timestamp = readNumber(doc["timestamp"], "timestamp");
  if (!timestamp.ok) return timestamp;
  const components = readComponents(doc["components"], "components");
  if (!components.ok) return components;
  const modals = readArray(doc["modals"] ?? [], "modals", readModal);
  if (!modals.ok) return modals;
  const dirty = readDirty(doc["dirty"], "dirty");
  if (!dirty.ok) return dirty;
  const metadata = readRecord(doc["metadata"] ?? {}, "metadata");
  if (!metadata.ok) return metadata;
  return ok({
    timestamp: timestamp.value,
    components: components.value,
    modals: modals.value,
    dirty: dirty.value,
    metadata: metadata.value,
  });
}

/* ---------- Document form ---------- */

export function snapshotToDocument(s: Snapshot): Readonly<Record<string, unknown>> {
  return deepCopy({
    timestamp: s.timestamp,
    focusPath: s.focusPath,
    components: s.components,
    modals: s.modals,
    dirty: s.dirty,
    metadata: s.metadata,
  });
}

export function snapshotFromDocument(doc: unknown): Parsed<Snapshot> {
  const rec = readRecord(doc, "$");
  if (!rec.ok) return rec;
  const common = readCommon(rec.value);
  if (!common.ok) return common;
  const focusPath = readArray(rec.value["focusPath"], "focusPath", readString);
  if (!focusPath.ok) return focusPath;
  return ok(createSnapshot({ ...common.value, focusPath: focusPath.value }));
}

/** Indented JSON. Throws SERIALIZE_ERROR for values JSON cannot carry. */
export function serializeSnapshot(s: Snapshot): string {
  try {
    return JSON.stringify(snapshotToDocument(s), null, 2);
  } catch (cause: unknown) {
    throw new TermlineError("SERIALIZE_ERROR", "snapshot is not serializable", { cause });
  }
}

export function deserializeSnapshot(text: string): Parsed<Snapshot> {
  let doc: unknown;
  try {
    doc = JSON.parse(text);
  } catch (cause: unknown) {
    return err(new TermlineError("SERIALIZE_ERROR", "snapshot document is not valid JSON", { cause }));
  }
  return snapshotFromDocument(doc);
}

/* ---------- Record form ---------- */

function splitFocusPath(dotted: string): FocusPath {
  return dotted.split(".").filter((part) => part.length > 0);
}

export function exportToRecord(s: Snapshot): Readonly<Record<string, unknown>> {
  const components: Record<string, unknown> = {};
  for (const [id, c] of Object.entries(s.components)) {
    components[id] = {
      type: c.type,
      props: c.props,
      state: c.state,
      rect: c.rect,
      visible: c.visible,
      disabled: c.disabled,
    };
  }
  const out: Record<string, unknown> = {
    timestamp: s.timestamp,
    focusPath: pathToString(s.focusPath),
    components,
    modals: s.modals,
  };
  if (s.dirty.cells.length > 0 || s.dirty.rects.length > 0) out["dirty"] = s.dirty;
  if (Object.keys(s.metadata).length > 0) out["metadata"] = s.metadata;
  return deepCopy(out);
}

export function importFromRecord(record: unknown): Parsed<Snapshot> {
  const rec = readRecord(record, "$");
  if (!rec.ok) return rec;
  const common = readCommon(rec.value);
  if (!common.ok) return common;
  const dotted = readString(rec.value["focusPath"] ?? "", "focusPath");
  if (!dotted.ok) return dotted;
  return ok(createSnapshot({ ...common.value, focusPath: splitFocusPath(dotted.value) }));
}
