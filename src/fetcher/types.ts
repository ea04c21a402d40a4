// 抓取层类型：调用方只看 statusCode，网络错误统一为 statusCode 0 + 空 body

export type RequestBody = string | Record<string, string>;


export interface FetchOptions {
  /** 默认 GET；传 body 时默认 POST */
  method?: "GET" | "POST";
  /** 字符串原样发送，对象按表单编码 */
  body?: RequestBody;
  headers?: Record<string, string>;
  timeoutMs?: number;
}


export interface FetchResult {
  /** HTTP 状态码；超时、DNS、TLS 等网络错误为 0 */
  statusCode: number;
  body: Buffer;
  contentType: string;
  /** 跟随重定向后的最终 URL */
  finalUrl: string;
}


export interface FetchToFileResult {
  statusCode: number;
  finalUrl: string;
  /** 写入字节数，失败为 0 */
  bytes: number;
}


/** 抓取能力：ContentFetcher 实现，测试中可替换为进程内假实现 */
export interface Fetcher {
  fetch(url: string, options?: FetchOptions): Promise<FetchResult>;
  /** 仅在状态码为 200 时写入文件 */
  fetchToFile(url: string, path: string, options?: FetchOptions): Promise<FetchToFileResult>;
  /** 释放连接池等资源 */
  close?(): Promise<void>;
}
