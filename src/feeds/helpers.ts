// feed 回调常用的小工具

/** 付费墙标记 */
export const PAYWALL_MARKER = "🔒 ";


/** 修正站点输出的错误链接，如 "http://https://example.org/a" */
export function cleanLink(link: string): string {
  return link.trim().replace(/^https?:\/\/(https?:\/\/)/i, "$1");
}


/** 若 haystack 包含 needle，则给标题加付费墙标记（已加过不重复） */
export function detectPaywall(title: string, haystack: string, needle: string): string {
  if (!needle || !haystack.includes(needle)) return title;
  return title.startsWith(PAYWALL_MARKER) ? title : PAYWALL_MARKER + title;
}


/** 按点分路径取值，如 getPath(item, "data.attributes.title")；数组下标同样用点分 */
export function getPath(value: unknown, path: string): unknown {
  let cur: unknown = value;
  for (const key of path.split(".")) {
    if (cur == null || typeof cur !== "object") return undefined;
    cur = Reflect.get(cur, key);
  }
  return cur;
}
