// 路径配置：集中管理所有运行时路径，区分项目文件与运行时数据

import { mkdir } from "node:fs/promises";
import { join, resolve } from "node:path";


function dirFromEnv(name: string, fallback: string): string {
  const v = process.env[name]?.trim();
  return v ? resolve(v) : fallback;
}


/** 运行时数据根目录：.refeed/（不纳入版本管理），可用 REFEED_DIR 覆盖 */
export const REFEED_DIR = dirFromEnv("REFEED_DIR", join(process.cwd(), ".refeed"));


/** 数据目录：.refeed/data/（SQLite、cookie、出口 IP 列表） */
export const DATA_DIR = join(REFEED_DIR, "data");


/** 条目缓存数据库 */
export const CACHE_DB_PATH = join(DATA_DIR, "feeds.sqlite");


/** cookie 持久化文件 */
export const COOKIE_JAR_PATH = join(DATA_DIR, "cookies.json");


/** 出口 IP 列表：每行一个公网地址，# 开头为注释 */
export const OUTBOUND_IPS_PATH = join(DATA_DIR, "outbound_ips.txt");


/** 全局设置：.refeed/config.json */
export const CONFIG_PATH = join(REFEED_DIR, "config.json");


/** feed 定义目录：feeds/*.feed.{ts,js}（项目文件，纳入版本管理） */
export const FEEDS_DIR = dirFromEnv("FEEDS_DIR", join(process.cwd(), "feeds"));


/** 播客音频与封面目录，对外以 PUBLIC_BASE_URL 提供 */
export const PUBLIC_DIR = dirFromEnv("PUBLIC_DIR", join(process.cwd(), "public"));


/** 初始化运行时目录 */
export async function initUserDir(): Promise<void> {
  await mkdir(REFEED_DIR, { recursive: true });
  await mkdir(DATA_DIR, { recursive: true });
  await mkdir(PUBLIC_DIR, { recursive: true });
}
