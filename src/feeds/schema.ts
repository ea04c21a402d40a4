// feed 定义校验：构造时一次性校验全部字段，失败抛 FeedConfigError，早于任何网络请求

import { z } from "zod";
import { FeedConfigError } from "./errors.js";
import type {
  EnclosureFallbackDownloader,
  FeedDefinition,
  FeedDescriptor,
  FeedFinalizer,
  ItemTransform,
  JsonItemTransform,
  JsonItemsEnumerator,
  PodcastImageResolver,
  PodcastItemImageResolver,
} from "./types.js";


/** 默认缓存保留：7 天 */
export const DEFAULT_CACHE_LIMIT = 7 * 24 * 3600;


const FEED_DEFAULTS = {
  itemsXpath: "//item",
  itemLinkXpath: "./link",
  itemTitleXpath: "./title",
  itemContentXpath: "./description",
} as const;


function fn<T>(label: string) {
  return z.custom<T>((v) => typeof v === "function", { message: `${label} 必须是函数` });
}


function selector<T>(label: string) {
  return z.union([z.string().min(1), fn<(item: unknown) => T | null | undefined>(label)]);
}


const httpUrl = z
  .string()
  .url("url 不是合法 URL")
  .refine((u) => /^https?:\/\//i.test(u), "url 必须是 http(s) 地址");


const jsonSchema = z
  .object({
    items: fn<JsonItemsEnumerator>("json.items"),
    link: selector<string>("json.link"),
    title: selector<string>("json.title").optional(),
    content: selector<string>("json.content").optional(),
    time: selector<string | number>("json.time").optional(),
    jsonUrl: selector<string>("json.jsonUrl").optional(),
    itemTransform: fn<JsonItemTransform>("json.itemTransform").optional(),
  })
  .strict();


const podcastSchema = z
  .object({
    image: fn<PodcastImageResolver>("podcast.image").optional(),
    itemImage: fn<PodcastItemImageResolver>("podcast.itemImage").optional(),
    enclosureFallback: fn<EnclosureFallbackDownloader>("podcast.enclosureFallback").optional(),
    category: z.string().min(1).optional(),
    author: z.string().min(1).optional(),
    owner: z.object({ name: z.string().min(1), email: z.string().email() }).optional(),
    block: z.boolean().default(true),
    explicit: z.boolean().default(false),
  })
  .strict();


const definitionSchema = z
  .object({
    name: z.string().regex(/^[A-Za-z0-9_-]+$/, "name 只能包含字母、数字、_ 与 -"),
    sourceKind: z.enum(["feed", "page", "json"]).default("feed"),
    url: httpUrl,
    title: z.string().min(1).optional(),
    description: z.string().default(""),
    language: z.string().min(1).default("en"),
    itemsXpath: z.string().min(1).optional(),
    itemLinkXpath: z.string().min(1).optional(),
    itemLinkPrefix: z.string().optional(),
    itemTitleXpath: z.string().min(1).optional(),
    itemContentXpath: z.string().min(1).optional(),
    itemTimeXpath: z.string().min(1).optional(),
    json: jsonSchema.optional(),
    itemTransform: fn<ItemTransform>("itemTransform").optional(),
    readability: z.boolean().default(true),
    cacheLimit: z.number().int("cacheLimit 必须是整数").positive().default(DEFAULT_CACHE_LIMIT),
    cacheKeyStripQuery: z.boolean().default(false),
    xmlNamespaces: z.record(z.string().min(1)).default({}),
    finalize: fn<FeedFinalizer>("finalize").optional(),
    podcast: podcastSchema.optional(),
  })
  .strict()
  .superRefine((d, ctx) => {
    const need = (cond: boolean, path: string, message: string) => {
      if (!cond) ctx.addIssue({ code: z.ZodIssueCode.custom, path: [path], message });
    };
    const kind = d.sourceKind;
    if (kind === "page") {
      need(d.title != null, "title", "page 信源必须提供 title");
      need(d.itemsXpath != null, "itemsXpath", "page 信源必须提供 itemsXpath");
      need(d.itemLinkXpath != null, "itemLinkXpath", "page 信源必须提供 itemLinkXpath");
    }
    if (kind === "json") {
      need(d.title != null, "title", "json 信源必须提供 title");
      need(d.json != null, "json", "json 信源必须提供 json.items 与 json.link");
    } else {
      need(d.json == null, "json", "json 选项只用于 json 信源");
    }
    if (kind !== "page") {
      need(d.itemLinkPrefix == null, "itemLinkPrefix", "itemLinkPrefix 只用于 page 信源");
      need(d.itemTimeXpath == null, "itemTimeXpath", "itemTimeXpath 只用于 page 信源");
    }
    need(kind !== "feed" || d.podcast == null, "podcast", "播客只支持 page 与 json 信源");
  });


function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
}


/** 定义辅助函数：只为类型推导 */
export function defineFeed(definition: FeedDefinition): FeedDefinition {
  return definition;
}


/** 校验 feed 定义并补全默认值，返回冻结的描述对象 */
export function createFeedDescriptor(definition: FeedDefinition): FeedDescriptor {
  const parsed = definitionSchema.safeParse(definition);
  if (!parsed.success) {
    const label = typeof definition.name === "string" && definition.name ? definition.name : "?";
    throw new FeedConfigError(label, formatIssues(parsed.error));
  }
  const d = parsed.data;
  const isFeed = d.sourceKind === "feed";
  const descriptor: FeedDescriptor = {
    name: d.name,
    sourceKind: d.sourceKind,
    url: d.url,
    title: d.title ?? null,
    description: d.description,
    language: d.language,
    itemsXpath: d.itemsXpath ?? (isFeed ? FEED_DEFAULTS.itemsXpath : ""),
    itemLinkXpath: d.itemLinkXpath ?? (isFeed ? FEED_DEFAULTS.itemLinkXpath : ""),
    itemLinkPrefix: d.itemLinkPrefix ?? "",
    itemTitleXpath: d.itemTitleXpath ?? (isFeed ? FEED_DEFAULTS.itemTitleXpath : null),
    itemContentXpath: d.itemContentXpath ?? (isFeed ? FEED_DEFAULTS.itemContentXpath : null),
    itemTimeXpath: d.itemTimeXpath ?? null,
    json: d.json ?? null,
    itemTransform: d.itemTransform ?? null,
    readability: d.readability,
    cacheLimit: d.cacheLimit,
    cacheKeyStripQuery: d.cacheKeyStripQuery,
    xmlNamespaces: Object.freeze({ ...d.xmlNamespaces }),
    finalize: d.finalize ?? null,
    podcast: d.podcast ?? null,
  };
  return Object.freeze(descriptor);
}
