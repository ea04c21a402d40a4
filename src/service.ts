// 进程级服务：持有设置、缓存连接、抓取器与各解析器；HTTP 入口与清理命令共用

import { CACHE_DB_PATH, CONFIG_PATH, COOKIE_JAR_PATH, FEEDS_DIR, OUTBOUND_IPS_PATH, PUBLIC_DIR } from "./config/paths.js";
import { loadSettings, type RefeedSettings } from "./config/settings.js";
import { ItemCache } from "./db/index.js";
import { ReadabilityExtractor, type ContentExtractor } from "./extractor/index.js";
import { FeedAssembler, type GenerateResult } from "./feeder/index.js";
import { ContentFetcher } from "./fetcher/index.js";
import type { Fetcher } from "./fetcher/types.js";
import { FeedNotFoundError } from "./feeds/errors.js";
import { loadFeedDefinitions } from "./feeds/loader.js";
import { createFeedDescriptor } from "./feeds/schema.js";
import type { FeedDefinition, FeedDescriptor } from "./feeds/types.js";
import { CacheJanitor, type JanitorReport } from "./janitor/index.js";
import { logger, errMessage } from "./logger/index.js";
import { ExternalMediaTools, type MediaTools } from "./podcast/media.js";
import { PodcastResolver } from "./podcast/resolver.js";
import { ContentResolver } from "./resolver/content.js";
import { systemClock, type Clock } from "./utils/time.js";


export interface RefeedServiceDeps {
  settings: RefeedSettings;
  cache: ItemCache;
  fetcher: Fetcher;
  definitions: Map<string, FeedDefinition>;
  publicDir: string;
  extractor?: ContentExtractor;
  tools?: MediaTools;
  now?: Clock;
}


export interface RefeedServicePaths {
  configPath: string;
  dbPath: string;
  feedsDir: string;
  publicDir: string;
  cookieJarPath: string | null;
  outboundIpsPath: string | null;
}


const DEFAULT_PATHS: RefeedServicePaths = {
  configPath: CONFIG_PATH,
  dbPath: CACHE_DB_PATH,
  feedsDir: FEEDS_DIR,
  publicDir: PUBLIC_DIR,
  cookieJarPath: COOKIE_JAR_PATH,
  outboundIpsPath: OUTBOUND_IPS_PATH,
};


export class RefeedService {
  readonly podcast: PodcastResolver;
  readonly resolver: ContentResolver;
  readonly assembler: FeedAssembler;
  readonly janitor: CacheJanitor;
  private readonly descriptors = new Map<string, FeedDescriptor>();

  constructor(private readonly deps: RefeedServiceDeps) {
    const { settings, cache, fetcher } = deps;
    const now = deps.now ?? systemClock;
    this.resolver = new ContentResolver({ cache, fetcher, extractor: deps.extractor ?? new ReadabilityExtractor() });
    this.podcast = new PodcastResolver({
      cache,
      fetcher,
      tools: deps.tools ?? new ExternalMediaTools(settings.downloader, settings.mediainfo),
      publicDir: deps.publicDir,
      publicBaseUrl: settings.publicBaseUrl,
    });
    this.assembler = new FeedAssembler({
      fetcher,
      resolver: this.resolver,
      podcast: this.podcast,
      itemConcurrency: settings.itemConcurrency,
      now,
    });
    this.janitor = new CacheJanitor({ cache, publicDir: deps.publicDir, now });
  }

  /** 读取设置、打开缓存、加载 feed 定义；每个进程只调用一次 */
  static async create(overrides: Partial<RefeedServicePaths> = {}): Promise<RefeedService> {
    const paths = { ...DEFAULT_PATHS, ...overrides };
    const settings = await loadSettings(paths.configPath);
    const [fetcher, definitions] = await Promise.all([
      ContentFetcher.create(settings, { cookieJarPath: paths.cookieJarPath, outboundIpsPath: paths.outboundIpsPath }),
      loadFeedDefinitions(paths.feedsDir),
    ]);
    const cache = ItemCache.open(paths.dbPath);
    return new RefeedService({ settings, cache, fetcher, definitions, publicDir: paths.publicDir });
  }

  feedNames(): string[] {
    return [...this.deps.definitions.keys()];
  }

  /** 校验结果按名称缓存；未知名称抛 FeedNotFoundError，定义无效抛 FeedConfigError */
  getFeed(name: string): FeedDescriptor {
    const known = this.descriptors.get(name);
    if (known) return known;
    const definition = this.deps.definitions.get(name);
    if (!definition) throw new FeedNotFoundError(name);
    const descriptor = createFeedDescriptor({ ...definition, name });
    this.descriptors.set(name, descriptor);
    return descriptor;
  }

  /** 全部有效的 feed；无效定义记错误后跳过 */
  allFeeds(): FeedDescriptor[] {
    const feeds: FeedDescriptor[] = [];
    for (const name of this.feedNames()) {
      try {
        feeds.push(this.getFeed(name));
      } catch (err) {
        logger.error("config", "feed 定义无效，已跳过", { feed: name, err: errMessage(err) });
      }
    }
    return feeds;
  }

  async generate(name: string): Promise<{ feed: FeedDescriptor; result: GenerateResult }> {
    const feed = this.getFeed(name);
    return { feed, result: await this.assembler.generate(feed) };
  }

  async clean(): Promise<JanitorReport> {
    return this.janitor.clean(this.allFeeds());
  }

  async close(): Promise<void> {
    this.deps.cache.close();
    await this.deps.fetcher.close?.();
  }
}
