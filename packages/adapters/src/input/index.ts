export { InputAdapter, type InputAdapterConfig } from "./InputAdapter";
export type { InputSource, KeyEventData, PointerEventData } from "./InputSource";
export { DEFAULT_KEY_BINDINGS, type KeyBindings } from "./keyBindings";
