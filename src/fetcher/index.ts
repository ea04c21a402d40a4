// 抓取层：undici 请求 + 手动跟随重定向（每跳都记录 cookie）+ 随机出口 IP
// 任何网络错误都不抛出，统一返回 statusCode 0

import { createWriteStream } from "node:fs";
import { rm, stat } from "node:fs/promises";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { Agent, fetch, type Response } from "undici";
import { logger, errMessage } from "../logger/index.js";
import type { RefeedSettings } from "../config/settings.js";
import { CookieStore } from "./cookies.js";
import { OutboundIpPool } from "./ipPool.js";
import type { FetchOptions, FetchResult, FetchToFileResult, Fetcher, RequestBody } from "./types.js";

export type { FetchOptions, FetchResult, FetchToFileResult, Fetcher, RequestBody } from "./types.js";
export { CookieStore } from "./cookies.js";
export { OutboundIpPool, isPublicIp } from "./ipPool.js";
export { decodeBody, detectEncoding, rewriteXmlEncoding } from "./encoding.js";


const ACCEPT = "text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8";


export interface ContentFetcherOptions {
  userAgent: string;
  acceptLanguage: string;
  timeoutMs: number;
  maxRedirects: number;
  ipPool?: OutboundIpPool;
  cookies?: CookieStore;
}


interface EncodedBody {
  payload: string;
  contentType: string | null;
}


interface Opened {
  response: Response;
  finalUrl: string;
}


function encodeBody(body: RequestBody | undefined): EncodedBody | null {
  if (body == null) return null;
  if (typeof body === "string") return { payload: body, contentType: null };
  return { payload: new URLSearchParams(body).toString(), contentType: "application/x-www-form-urlencoded" };
}


function isRedirect(status: number): boolean {
  return status >= 300 && status < 400 && status !== 304;
}


/** undici 的 "fetch failed" 把真实原因放在 cause 里 */
function describeError(err: unknown): string {
  if (err instanceof Error && err.cause instanceof Error) return `${err.message}: ${err.cause.message}`;
  return errMessage(err);
}


export class ContentFetcher implements Fetcher {
  private readonly agents = new Map<string, Agent>();
  private readonly cookies: CookieStore;

  constructor(private readonly options: ContentFetcherOptions) {
    this.cookies = options.cookies ?? CookieStore.memory();
  }

  /** 按全局设置创建：加载 cookie 文件与出口 IP 池 */
  static async create(
    settings: RefeedSettings,
    paths: { cookieJarPath: string | null; outboundIpsPath: string | null }
  ): Promise<ContentFetcher> {
    const [cookies, ipPool] = await Promise.all([
      CookieStore.load(paths.cookieJarPath),
      paths.outboundIpsPath ? OutboundIpPool.load(paths.outboundIpsPath) : Promise.resolve(new OutboundIpPool([])),
    ]);
    return new ContentFetcher({
      userAgent: settings.userAgent,
      acceptLanguage: settings.acceptLanguage,
      timeoutMs: settings.fetchTimeoutMs,
      maxRedirects: settings.maxRedirects,
      ipPool,
      cookies,
    });
  }

  /** 每次请求从池中随机取一个出口地址，同一地址复用 Agent */
  private pickDispatcher(url: string): Agent | undefined {
    const address = this.options.ipPool?.pick();
    if (!address) return undefined;
    let agent = this.agents.get(address);
    if (!agent) {
      agent = new Agent({ connect: { localAddress: address } });
      this.agents.set(address, agent);
    }
    logger.debug("fetcher", "使用出口 IP", { url, address });
    return agent;
  }

  private baseHeaders(): Record<string, string> {
    return {
      "User-Agent": this.options.userAgent,
      Accept: ACCEPT,
      "Accept-Language": this.options.acceptLanguage,
      "Cache-Control": "max-age=0",
      "Upgrade-Insecure-Requests": "1",
    };
  }

  /** 发起请求并跟随重定向，返回最终响应（body 未读取） */
  private async open(url: string, options: FetchOptions, signal: AbortSignal): Promise<Opened> {
    let body = encodeBody(options.body);
    let method = options.method ?? (body ? "POST" : "GET");
    let current = url;
    const dispatcher = this.pickDispatcher(url);
    for (let hop = 0; ; hop++) {
      const headers: Record<string, string> = { ...this.baseHeaders() };
      if (method === "POST" && body?.contentType) headers["Content-Type"] = body.contentType;
      Object.assign(headers, options.headers);
      const cookie = await this.cookies.cookieHeader(current);
      if (cookie) headers.Cookie = cookie;
      const response = await fetch(current, {
        method,
        headers,
        body: method === "POST" ? body?.payload : undefined,
        redirect: "manual",
        signal,
        dispatcher,
      });
      await this.cookies.store(response.headers.getSetCookie(), current);
      const location = response.headers.get("location");
      if (!isRedirect(response.status) || !location) return { response, finalUrl: current };
      await response.body?.cancel();
      if (hop >= this.options.maxRedirects) {
        throw new Error(`重定向次数超过 ${this.options.maxRedirects}`);
      }
      current = new URL(location, current).toString();
      if (response.status === 303 || (method === "POST" && (response.status === 301 || response.status === 302))) {
        method = "GET";
        body = null;
      }
    }
  }

  async fetch(url: string, options: FetchOptions = {}): Promise<FetchResult> {
    const signal = AbortSignal.timeout(options.timeoutMs ?? this.options.timeoutMs);
    try {
      const { response, finalUrl } = await this.open(url, options, signal);
      const body = Buffer.from(await response.arrayBuffer());
      logger.debug("fetcher", "请求完成", { url, status: response.status, bytes: body.length });
      return {
        statusCode: response.status,
        body,
        contentType: response.headers.get("content-type") ?? "",
        finalUrl,
      };
    } catch (err) {
      logger.warn("fetcher", "请求失败", { url, err: describeError(err) });
      return { statusCode: 0, body: Buffer.alloc(0), contentType: "", finalUrl: url };
    } finally {
      await this.cookies.save();
    }
  }

  async fetchToFile(url: string, path: string, options: FetchOptions = {}): Promise<FetchToFileResult> {
    const signal = AbortSignal.timeout(options.timeoutMs ?? this.options.timeoutMs);
    try {
      const { response, finalUrl } = await this.open(url, options, signal);
      if (response.status !== 200 || !response.body) {
        await response.body?.cancel();
        return { statusCode: response.status, finalUrl, bytes: 0 };
      }
      await pipeline(Readable.fromWeb(response.body), createWriteStream(path));
      const { size } = await stat(path);
      logger.debug("fetcher", "下载完成", { url, path, bytes: size });
      return { statusCode: 200, finalUrl, bytes: size };
    } catch (err) {
      logger.warn("fetcher", "下载失败", { url, path, err: describeError(err) });
      await rm(path, { force: true });
      return { statusCode: 0, finalUrl: url, bytes: 0 };
    } finally {
      await this.cookies.save();
    }
  }

  async close(): Promise<void> {
    await Promise.all([...this.agents.values()].map((a) => a.close()));
    this.agents.clear();
  }
}
