export { HttpRenderer } from "./httpRenderer";
export { RenderError } from "./renderError";
export type { RenderFailureKind } from "./renderError";
