// 播客封面：只接受正方形 PNG / JPEG，边长不在 [1400, 3000] 时缩放到最近的边界

import sharp from "sharp";
import { logger, errMessage } from "../logger/index.js";


export const PODCAST_IMAGE_MIN_SIZE = 1400;
export const PODCAST_IMAGE_MAX_SIZE = 3000;


export type CoverImageResult =
  | { ok: true; data: Buffer; ext: "png" | "jpg"; size: number; resized: boolean }
  | { ok: false; reason: string };


/** 边长需要调整时返回目标边长 */
export function targetCoverSize(side: number): number | null {
  if (side < PODCAST_IMAGE_MIN_SIZE) return PODCAST_IMAGE_MIN_SIZE;
  if (side > PODCAST_IMAGE_MAX_SIZE) return PODCAST_IMAGE_MAX_SIZE;
  return null;
}


/** 校验并按需缩放；缩放失败或结果为空时保留原图 */
export async function prepareCoverImage(input: Buffer): Promise<CoverImageResult> {
  let format: string | undefined;
  let width: number | undefined;
  let height: number | undefined;
  try {
    ({ format, width, height } = await sharp(input).metadata());
  } catch (err) {
    return { ok: false, reason: `无法读取图片: ${errMessage(err)}` };
  }
  if (format !== "png" && format !== "jpeg") {
    return { ok: false, reason: `不支持的图片格式: ${format ?? "unknown"}` };
  }
  if (!width || !height) return { ok: false, reason: "无法读取图片尺寸" };
  if (width !== height) return { ok: false, reason: `图片不是正方形: ${width}x${height}` };
  const ext = format === "png" ? "png" : "jpg";
  const target = targetCoverSize(width);
  if (target == null) return { ok: true, data: input, ext, size: width, resized: false };
  let resized: Buffer;
  try {
    resized = await sharp(input).resize(target, target).toBuffer();
  } catch (err) {
    logger.warn("podcast", "封面缩放失败，保留原图", { err: errMessage(err) });
    resized = Buffer.alloc(0);
  }
  if (resized.length === 0) return { ok: true, data: input, ext, size: width, resized: false };
  return { ok: true, data: resized, ext, size: target, resized: true };
}
