// src/index.ts
export * from "./field/errors.js";
export * from "./field/exits.js";
export * from "./field/panel.js";
export * from "./field/field.js";
export type { FieldDims, WarnFn } from "./field/format.js";
export * from "./field/fld.js";
export * from "./field/fldx.js";
export * from "./field/base64.js";
export * from "./field/fieldJsonV1.js";
export * from "./field/display.js";
export * from "./field/fieldTransform.js";
export * from "./field/fieldFile.js";
export { FieldRenderer, type FieldRendererOptions } from "./field/render/fieldRenderer.js";
