// 日志类型与结构化条目
// 控制台由 LOG_LEVEL 过滤（默认 info）；设置 LOG_FILE 时按 JSON 行追加到文件，便于按 feed 排查。

/** 日志级别（debug < info < warn < error） */
export type LogLevel = "error" | "warn" | "info" | "debug";


/** 日志分类：按模块筛选 */
export type LogCategory =
  | "feeder"   // feed 组装与输出
  | "resolver" // 条目正文解析（缓存 / 抓取 / 提取）
  | "podcast"  // 播客音频与封面
  | "fetcher"  // 网络请求、cookie、出口 IP
  | "db"       // SQLite 缓存
  | "janitor"  // 缓存清理
  | "app"      // HTTP 服务与启动
  | "config";  // 配置与 feed 定义加载


/** payload 常用字段约定（非强制） */
export interface LogPayloadConvention {
  /** 错误对象 message，避免序列化整个 Error */
  err?: string;
  /** feed 名称 */
  feed?: string;
  /** 条目 URL */
  item_url?: string;
  [k: string]: unknown;
}


/** 单条日志的结构化数据 */
export interface LogEntry {
  level: LogLevel;
  category: LogCategory;
  message: string;
  /** 可选上下文（err、feed、item_url 等） */
  payload?: Record<string, unknown>;
  created_at: string;
}


/** 日志元数据 */
export type LogMeta = LogPayloadConvention;
