// 时间工具：统一使用 Unix 秒，0 表示未知

/** 返回当前 Unix 秒；测试中可注入固定时钟 */
export type Clock = () => number;


export const systemClock: Clock = () => Math.floor(Date.now() / 1000);


/** 解析任意日期字符串为 Unix 秒，失败返回 null */
export function parseTime(raw: string): number | null {
  const s = raw.trim();
  if (!s) return null;
  if (/^\d{9,11}$/.test(s)) return Number(s);
  const ms = Date.parse(s);
  return Number.isNaN(ms) ? null : Math.floor(ms / 1000);
}


/** Unix 秒转 RFC 822（RSS pubDate） */
export function toRfc822(seconds: number): string {
  return new Date(seconds * 1000).toUTCString();
}
