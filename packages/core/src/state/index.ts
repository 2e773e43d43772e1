export {
  EMPTY_FOCUS_PATH,
  type FocusPath,
  pathAppend,
  pathCurrent,
  pathEquals,
  pathParent,
  pathToString,
} from "./focusPath.js";
export {
  COMPONENT_FIELDS,
  type CellRef,
  type ComponentField,
  type ComponentInit,
  type ComponentState,
  type DirtyRegion,
  EMPTY_DIRTY,
  type ModalState,
  type ModalType,
  type Rect,
  type Snapshot,
  type SnapshotInit,
  ZERO_RECT,
  componentIds,
  componentsEqual,
  createComponentState,
  createSnapshot,
  dataOnly,
  dataValue,
  deepCopy,
  deepEqualUnknown,
  deepFreeze,
  getComponent,
  snapshotsEqual,
  withComponent,
  withDirty,
  withFocusPath,
  withMetadata,
  withModals,
  withoutComponent,
} from "./snapshot.js";
export { EMPTY_DIFF, type StateDiff, computeDiff, formatDiff, hasChanges } from "./diff.js";
export {
  type ComponentPatch,
  type StateHistory,
  type StateListener,
  StateTracker,
  type StateTrackerOptions,
} from "./tracker.js";
export {
  deserializeSnapshot,
  exportToRecord,
  importFromRecord,
  serializeSnapshot,
  snapshotFromDocument,
  snapshotToDocument,
} from "./serialize.js";
