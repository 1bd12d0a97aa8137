import fs from "node:fs";
import path from "node:path";
import { ResponsesError } from "./errors";
import { JsonObject } from "./types";

export type ImageDetail = "low" | "high" | "auto";

/** A URL, `data:` URL or local file path, optionally paired with its own detail level. */
export type ImageSource = string | readonly [string, ImageDetail];

export interface InputMessageOptions {
  detail?: ImageDetail;
  role?: "user" | "system" | "developer" | "assistant";
}

const IMAGE_MIME_TYPES: Readonly<Record<string, string>> = {
  ".png": "image/png",
  ".jpeg": "image/jpeg",
  ".jpg": "image/jpeg",
  ".webp": "image/webp",
  ".gif": "image/gif"
};

/**
 * Builds one input message from a text prompt and optional images. Local
 * image files are inlined as base64 data URLs.
 */
export function createInputMessage(
  text: string,
  images?: ImageSource | readonly ImageSource[],
  options: InputMessageOptions = {}
): JsonObject {
  const content: JsonObject[] = [{ type: "input_text", text }];

  for (const image of toImageList(images)) {
    const [source, detail]: readonly [string, ImageDetail | undefined] =
      typeof image === "string" ? [image, options.detail] : image;
    const part: JsonObject = { type: "input_image", image_url: resolveImageUrl(source) };
    if (detail) {
      part.detail = detail;
    }
    content.push(part);
  }

  return { role: options.role ?? "user", content };
}

export function resolveImageUrl(source: string): string {
  if (/^(https?:\/\/|data:)/.test(source)) {
    return source;
  }
  if (!fs.existsSync(source)) {
    throw new ResponsesError(
      "RESPONSES-E-INPUT",
      `Image source '${source}' is not a valid URL or existing file`,
      { source }
    );
  }
  return encodeImageFile(source);
}

function encodeImageFile(filePath: string): string {
  const extension = path.extname(filePath).toLowerCase();
  const mimeType = IMAGE_MIME_TYPES[extension];
  if (!mimeType) {
    throw new ResponsesError(
      "RESPONSES-E-INPUT",
      `Unsupported image format: ${extension || "(none)"}. Supported formats: ${Object.keys(IMAGE_MIME_TYPES).join(", ")}`,
      { source: filePath }
    );
  }

  try {
    return `data:${mimeType};base64,${fs.readFileSync(filePath).toString("base64")}`;
  } catch (error) {
    throw new ResponsesError("RESPONSES-E-INPUT", `Failed to read image file '${filePath}'.`, error);
  }
}

function toImageList(images: ImageSource | readonly ImageSource[] | undefined): readonly ImageSource[] {
  if (images === undefined) {
    return [];
  }
  if (typeof images === "string" || isDetailPair(images)) {
    return [images];
  }
  return images;
}

function isDetailPair(value: readonly [string, ImageDetail] | readonly ImageSource[]): value is readonly [string, ImageDetail] {
  return value.length === 2 && typeof value[0] === "string" && isImageDetail(value[1]);
}

function isImageDetail(value: unknown): value is ImageDetail {
  return value === "low" || value === "high" || value === "auto";
}
