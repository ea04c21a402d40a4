// 将频道 + 条目构建为 RSS 2.0 XML；标题与正文放进 CDATA

import { toRfc822 } from "../utils/time.js";
import type { PodcastChannelMeta, RssChannel, RssEntry } from "./types.js";


const ITUNES_NS = "http://www.itunes.com/dtds/podcast-1.0.dtd";


export function escapeXml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}


/** "]]>" 会提前结束 CDATA，拆成两段 */
export function cdata(s: string): string {
  return `<![CDATA[${s.replace(/\]\]>/g, "]]]]><![CDATA[>")}]]>`;
}


function buildPodcastChannel(meta: PodcastChannelMeta): string {
  let buf = "";
  if (meta.author) buf += `    <itunes:author>${escapeXml(meta.author)}</itunes:author>\n`;
  if (meta.category) buf += `    <itunes:category text="${escapeXml(meta.category)}"/>\n`;
  if (meta.owner) {
    buf += `    <itunes:owner>\n`;
    buf += `      <itunes:name>${escapeXml(meta.owner.name)}</itunes:name>\n`;
    buf += `      <itunes:email>${escapeXml(meta.owner.email)}</itunes:email>\n`;
    buf += `    </itunes:owner>\n`;
  }
  buf += `    <itunes:explicit>${meta.explicit ? "true" : "false"}</itunes:explicit>\n`;
  if (meta.block) buf += `    <itunes:block>Yes</itunes:block>\n`;
  if (meta.image) buf += `    <itunes:image href="${escapeXml(meta.image)}"/>\n`;
  return buf;
}


function buildItem(entry: RssEntry): string {
  const link = escapeXml(entry.link);
  const guid = escapeXml(entry.guid ?? entry.link);
  let buf = `    <item>\n      <title>${cdata(entry.title)}</title>\n      <link>${link}</link>\n      <description>${cdata(entry.description)}</description>\n`;
  if (entry.time) buf += `      <pubDate>${toRfc822(entry.time)}</pubDate>\n`;
  buf += `      <guid isPermaLink="true">${guid}</guid>\n`;
  if (entry.enclosure) {
    const { url, length, type } = entry.enclosure;
    buf += `      <enclosure url="${escapeXml(url)}" length="${length}" type="${escapeXml(type)}"/>\n`;
  }
  if (entry.duration != null) buf += `      <itunes:duration>${Math.round(entry.duration)}</itunes:duration>\n`;
  if (entry.image) buf += `      <itunes:image href="${escapeXml(entry.image)}"/>\n`;
  buf += `    </item>\n`;
  return buf;
}


export function buildRssXml(channel: RssChannel, entries: RssEntry[]): string {
  const title = escapeXml(channel.title);
  const link = escapeXml(channel.link);
  const desc = escapeXml(channel.description ?? "");
  const lang = escapeXml(channel.language ?? "en");
  const built = channel.buildTime != null ? toRfc822(channel.buildTime) : new Date().toUTCString();
  const ns = channel.podcast ? ` xmlns:itunes="${ITUNES_NS}"` : "";
  const podcast = channel.podcast ? buildPodcastChannel(channel.podcast) : "";
  const items = entries.map(buildItem).join("");
  return `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0"${ns}>
  <channel>
    <title>${title}</title>
    <link>${link}</link>
    <description>${desc}</description>
    <language>${lang}</language>
    <lastBuildDate>${built}</lastBuildDate>
${podcast}
${items}  </channel>
</rss>
`;
}
