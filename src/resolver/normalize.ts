// 文本规整：替换残留的换行实体与误编码的右单引号，折叠连续空白；重复执行结果不变

/** 多次应用结果相同 */
export function normalizeText(text: string): string {
  return text
    .replace(/&#xD;/gi, " ")
    .replace(/&#xA;/gi, " ")
    .replace(/\u0092/g, "’")
    .replace(/\s\s+/g, " ");
}


/** 视为空：空串或只有空白 */
export function isBlank(text: string): boolean {
  return text.trim() === "";
}


/** 去掉 query 与 hash，作为缓存键 */
export function stripQuery(url: string): string {
  try {
    const u = new URL(url);
    u.search = "";
    u.hash = "";
    return u.toString();
  } catch {
    return url.replace(/[?#].*$/, "");
  }
}
