import { htmlToText } from "../text/htmlToText";
import type { ProductRecord, RawProduct } from "./product.types";

export class InvalidProductError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidProductError";
  }
}

const isRecord = (value: unknown): value is RawProduct =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const optionalString = (value: unknown): string | null => {
  if (typeof value === "string") return value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return null;
};

const optionalId = (value: unknown): string | number | null => {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string") return value;
  return null;
};

const optionalPrice = (value: unknown): number | null => {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
};

/**
 * Maps a catalog product payload to the persisted record:
 * - `description` is converted from HTML to plain text
 * - `image_url` comes from `thumbnail_url`
 * - missing fields become `null`
 */
export const transformProduct = (payload: unknown): ProductRecord => {
  if (!isRecord(payload)) {
    throw new InvalidProductError("Invalid product payload: expected a JSON object");
  }

  const description = typeof payload.description === "string" ? htmlToText(payload.description) : "";

  return {
    id: optionalId(payload.id),
    name: optionalString(payload.name),
    url_key: optionalString(payload.url_key),
    price: optionalPrice(payload.price),
    description,
    image_url: optionalString(payload.thumbnail_url)
  };
};
