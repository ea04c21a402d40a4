// 文本编码：检测响应体编码并转为 UTF-8

import { isUtf8 } from "node:buffer";
import * as iconv from "iconv-lite";


const SNIFF_BYTES = 2048;


function normalizeLabel(label: string | undefined | null): string | null {
  if (!label) return null;
  const v = label.trim().replace(/^["']|["']$/g, "").toLowerCase();
  if (!v) return null;
  if (v === "utf8") return "utf-8";
  return iconv.encodingExists(v) ? v : null;
}


/** 从 Content-Type 头取 charset */
export function charsetFromContentType(contentType: string | undefined): string | null {
  if (!contentType) return null;
  const m = contentType.match(/charset\s*=\s*("?)([^";\s]+)\1/i);
  return normalizeLabel(m?.[2]);
}


/** 从文档开头的 XML 声明或 <meta> 取编码 */
function charsetFromMarkup(head: string): string | null {
  const xml = head.match(/^\s*<\?xml[^>]*\bencoding\s*=\s*["']([^"']+)["']/i);
  if (xml) return normalizeLabel(xml[1]);
  const meta = head.match(/<meta[^>]+charset\s*=\s*["']?([^"'\s/>;]+)/i);
  if (meta) return normalizeLabel(meta[1]);
  return null;
}


/** 检测顺序：BOM → Content-Type → 文档声明 → UTF-8 合法性 → windows-1252 */
export function detectEncoding(body: Buffer, contentType?: string): string {
  if (body.length >= 3 && body[0] === 0xef && body[1] === 0xbb && body[2] === 0xbf) return "utf-8";
  if (body.length >= 2 && body[0] === 0xff && body[1] === 0xfe) return "utf-16le";
  if (body.length >= 2 && body[0] === 0xfe && body[1] === 0xff) return "utf-16be";
  const declared = charsetFromContentType(contentType) ?? charsetFromMarkup(body.subarray(0, SNIFF_BYTES).toString("latin1"));
  if (declared) {
    // 声明为 UTF-8 但内容不合法时按 windows-1252 兜底
    if (declared === "utf-8" && !isUtf8(body)) return "windows-1252";
    return declared;
  }
  return isUtf8(body) ? "utf-8" : "windows-1252";
}


/** 将响应体解码为字符串（去除 BOM） */
export function decodeBody(body: Buffer, contentType?: string): string {
  return iconv.decode(body, detectEncoding(body, contentType));
}


/** 将 XML 声明中的 encoding 改为 UTF-8（内容已转码后调用） */
export function rewriteXmlEncoding(xml: string): string {
  return xml.replace(/^(\s*<\?xml[^>]*\bencoding\s*=\s*)(["'])[^"']*\2/i, "$1$2UTF-8$2");
}
