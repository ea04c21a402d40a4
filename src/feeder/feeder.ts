// Feeder：抓取 feed.url，按信源类型生成 RSS；失败只返回原因，由调用方决定如何呈现

import { buildRssXml } from "../feed/rss.js";
import type { FeedDescriptor, SourceKind } from "../feeds/types.js";
import type { FetchResult } from "../fetcher/types.js";
import { logger, errMessage } from "../logger/index.js";
import { systemClock } from "../utils/time.js";
import { generateFromFeed } from "./sources/feed.js";
import { generateFromJson } from "./sources/json.js";
import { generateFromPage } from "./sources/page.js";
import type { FeedAssemblerDeps, GenerateResult, SourceContext } from "./types.js";


type SourceHandler = (feed: FeedDescriptor, res: FetchResult, ctx: SourceContext) => Promise<GenerateResult>;


const HANDLERS: Record<SourceKind, SourceHandler> = {
  feed: generateFromFeed,
  page: generateFromPage,
  json: generateFromJson,
};


/** 错误 RSS：信源抓取或解析失败时返回 */
export function buildErrorRss(feed: FeedDescriptor, message: string): string {
  return buildRssXml(
    { title: feed.title ?? feed.name, link: feed.url, description: message, language: feed.language },
    [{ title: "抓取失败", link: feed.url, description: message, guid: `${feed.url}#error` }]
  );
}


export class FeedAssembler {
  private readonly ctx: SourceContext;

  constructor(private readonly deps: FeedAssemblerDeps) {
    this.ctx = {
      resolver: deps.resolver,
      podcast: deps.podcast,
      concurrency: Math.max(1, deps.itemConcurrency ?? 1),
      now: deps.now ?? systemClock,
    };
  }

  async generate(feed: FeedDescriptor): Promise<GenerateResult> {
    const meta = { feed: feed.name, url: feed.url };
    const started = Date.now();
    const res = await this.deps.fetcher.fetch(feed.url);
    if (res.statusCode !== 200) {
      logger.warn("feeder", "信源抓取失败", { ...meta, status: res.statusCode });
      return { ok: false, reason: `信源返回 ${res.statusCode}` };
    }
    const result = await HANDLERS[feed.sourceKind](feed, res, this.ctx);
    if (!result.ok) {
      logger.warn("feeder", "生成失败", { ...meta, err: result.reason });
      return result;
    }
    let xml = result.xml;
    if (feed.finalize) {
      try {
        xml = feed.finalize(xml);
      } catch (err) {
        logger.warn("feeder", "finalize 异常", { ...meta, err: errMessage(err) });
        return { ok: false, reason: `finalize 异常: ${errMessage(err)}` };
      }
    }
    logger.info("feeder", "已生成", { ...meta, items: result.itemCount, elapsed_ms: Date.now() - started });
    return { ...result, xml };
  }
}
