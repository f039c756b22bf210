export { EngineLoop, animationFrameScheduler } from "./EngineLoop";
export type { FrameScheduler, RenderFn, UpdateFn } from "./EngineLoop";
export { InputManager } from "./InputManager";
export type { PointerState } from "./InputManager";
