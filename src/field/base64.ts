// src/field/base64.ts
import { InvalidDocumentError } from "./errors.js";
import type { Field } from "./field.js";
import { decodeFld, encodeFld } from "./fld.js";
import { decodeFldx, encodeFldx } from "./fldx.js";
import type { FieldDims, WarnFn } from "./format.js";

// URL-safe alphabet, padded with '='.
const URL_SAFE_B64 = /^[A-Za-z0-9_-]*={0,2}$/;

export function bytesToBase64Url(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("base64").replace(/\+/g, "-").replace(/\//g, "_");
}

export function base64UrlToBytes(text: string): Uint8Array {
  const s = text.trim();
  if (!URL_SAFE_B64.test(s) || s.length % 4 !== 0) {
    throw new InvalidDocumentError("Invalid base64: expected padded URL-safe base64 text");
  }
  return Buffer.from(s.replace(/-/g, "+").replace(/_/g, "/"), "base64");
}

export function encodeFldBase64(field: Field): string {
  return bytesToBase64Url(encodeFld(field));
}

export function decodeFldBase64(dims: FieldDims, text: string, warn?: WarnFn): Field {
  return decodeFld(dims, base64UrlToBytes(text), warn);
}

export function encodeFldxBase64(field: Field): string {
  return bytesToBase64Url(encodeFldx(field));
}

export function decodeFldxBase64(text: string, warn?: WarnFn): Field {
  return decodeFldx(base64UrlToBytes(text), warn);
}
