// cookie 持久化：进程内共享一个 CookieJar，每次请求后写回 cookies.json

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { CookieJar } from "tough-cookie";
import { logger, errMessage } from "../logger/index.js";


export class CookieStore {
  private saving: Promise<void> = Promise.resolve();

  constructor(
    readonly jar: CookieJar,
    private readonly path: string | null
  ) {}

  /** 仅在内存中的 jar，不落盘 */
  static memory(): CookieStore {
    return new CookieStore(new CookieJar(), null);
  }

  /** 从文件恢复；文件缺失或损坏时从空 jar 开始 */
  static async load(path: string | null): Promise<CookieStore> {
    if (path == null) return new CookieStore(new CookieJar(), null);
    try {
      const raw = await readFile(path, "utf-8");
      return new CookieStore(await CookieJar.deserialize(raw), path);
    } catch (err) {
      if (!(err instanceof Error && "code" in err && err.code === "ENOENT")) {
        logger.warn("fetcher", "cookie 文件无法读取，使用空 jar", { path, err: errMessage(err) });
      }
      return new CookieStore(new CookieJar(), path);
    }
  }

  async cookieHeader(url: string): Promise<string> {
    return this.jar.getCookieString(url);
  }

  async store(setCookies: readonly string[], url: string): Promise<void> {
    for (const c of setCookies) {
      await this.jar.setCookie(c, url, { ignoreError: true });
    }
  }

  /** 串行写回，避免并发请求交错写文件 */
  save(): Promise<void> {
    const path = this.path;
    if (path == null) return Promise.resolve();
    this.saving = this.saving.then(async () => {
      try {
        const data = await this.jar.serialize();
        await mkdir(dirname(path), { recursive: true });
        await writeFile(path, JSON.stringify(data), "utf-8");
      } catch (err) {
        logger.warn("fetcher", "保存 cookie 失败", { path, err: errMessage(err) });
      }
    });
    return this.saving;
  }
}
