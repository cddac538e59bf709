export type { Clipboard } from "./clipboard.js";
export type {
  Direction,
  EditCommand,
  EditSessionListener,
  EditSessionOptions,
  MouseModifiers,
} from "./edit-session.js";
export type { KeyInput } from "./key-input.js";
export type { Alignment, VisibleRange } from "./scroll-window.js";
export type { SelectionRange } from "./selection-model.js";
export type { TextMetrics } from "./text-metrics.js";
export type { ValidatorPreset } from "./text-validator.js";
export type { LineInputProps } from "./components/line-input.js";

export { MemoryClipboard } from "./clipboard.js";
export { default as DisplayProjector } from "./display-projector.js";
export { default as EditSession } from "./edit-session.js";
export { canHandleKeyPress, resolveKeyCommand } from "./key-input.js";
export { default as ScrollWindow } from "./scroll-window.js";
export { default as SelectionModel } from "./selection-model.js";
export {
  default as TextBuffer,
  cpLen,
  cpSlice,
  toCodePoints,
} from "./text-buffer.js";
export { MonospaceTextMetrics, terminalTextMetrics } from "./text-metrics.js";
export { default as TextValidator, Validators } from "./text-validator.js";
export {
  default as LineInput,
  renderLineInput,
} from "./components/line-input.js";
