export {
  EMPTY_MODS,
  type KeyInput,
  type KeyMods,
  type KeyName,
  type MouseAction,
  type MouseButton,
  type MouseInput,
  NAMED_KEYS,
  type NamedKey,
  type PasteInput,
  type RawInput,
  type ResizeInput,
  type SignalInput,
  charInput,
  isNamedKey,
  keyInput,
} from "./types.js";
export {
  type KeyCombo,
  type KeyParseError,
  canonicalCombo,
  comboOf,
  comboToString,
  parseKeyCombo,
} from "./keyParser.js";
export { InputDecoder, MAX_LOOKAHEAD, decodeInput, decodeMouseCode } from "./decoder.js";
export {
  type MouseGesture,
  type MouseGestureType,
  MouseTracker,
  type MouseTrackerOptions,
} from "./mouseTracker.js";
export {
  type BindingInfo,
  DEFAULT_BINDINGS,
  VIM_BINDINGS,
  VIM_CONTEXT,
  type InvalidBinding,
  KeyMap,
  type KeyMapOptions,
} from "./keymap.js";
export {
  type ConfiguredBinding,
  type KeyMapConfig,
  type KeyMapSection,
  parseKeyMapConfig,
} from "./keymapConfig.js";
