// RSS 2.0 输出结构

import type { PodcastOwner } from "../feeds/types.js";


/** 频道级 itunes 元数据 */
export interface PodcastChannelMeta {
  category?: string;
  author?: string;
  owner?: PodcastOwner;
  block: boolean;
  explicit: boolean;
  /** 封面公网 URL */
  image?: string;
}


export interface RssChannel {
  title: string;
  link: string;
  description?: string;
  language?: string;
  /** 存在时输出 itunes 命名空间与频道元数据 */
  podcast?: PodcastChannelMeta;
  /** lastBuildDate，Unix 秒；缺省为当前时间 */
  buildTime?: number;
}


export interface RssEnclosure {
  url: string;
  length: number;
  type: string;
}


export interface RssEntry {
  title: string;
  link: string;
  description: string;
  guid?: string;
  /** Unix 秒，0 或缺省时不输出 pubDate */
  time?: number;
  enclosure?: RssEnclosure;
  /** 秒 */
  duration?: number;
  /** 条目封面公网 URL */
  image?: string;
}
