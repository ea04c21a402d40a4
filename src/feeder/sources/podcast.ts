// 播客补充：频道 itunes 元数据与封面，条目附件、时长与封面

import type { PodcastChannelMeta, RssEntry } from "../../feed/types.js";
import type { FeedDescriptor, PodcastItemContext, PodcastOptions, PodcastSourceContext } from "../../feeds/types.js";
import type { PodcastResolver } from "../../podcast/resolver.js";
import { cacheKeyFor } from "../../resolver/content.js";


type PodcastItemFields = Pick<RssEntry, "enclosure" | "duration" | "image">;


export async function podcastChannel(
  feed: FeedDescriptor,
  options: PodcastOptions,
  podcast: PodcastResolver,
  ctx: PodcastSourceContext
): Promise<PodcastChannelMeta> {
  const { image } = options;
  const cover = image ? await podcast.resolveImage(feed, "feed", "", () => image(ctx)) : "";
  return {
    category: options.category,
    author: options.author,
    owner: options.owner,
    block: options.block,
    explicit: options.explicit,
    image: cover || undefined,
  };
}


/** 附件解析失败时条目照常输出，只是没有 enclosure；条目封面以正文缓存键为 id */
export async function podcastItem(
  feed: FeedDescriptor,
  options: PodcastOptions,
  podcast: PodcastResolver,
  ctx: PodcastItemContext
): Promise<PodcastItemFields> {
  const fields: PodcastItemFields = {};
  const enclosure = await podcast.resolveEnclosure(feed, ctx.link);
  if (enclosure.status !== "error") {
    fields.enclosure = { url: enclosure.url, length: enclosure.length, type: enclosure.type };
    fields.duration = enclosure.duration;
  }
  const { itemImage } = options;
  if (itemImage) {
    const image = await podcast.resolveImage(feed, "entry", cacheKeyFor(feed, ctx.link), () => itemImage(ctx));
    if (image) fields.image = image;
  }
  return fields;
}
