// HTML 列表页：相对链接补前缀，列表中已有摘要，缺正文时才抓详情

import { defineFeed, nodeHtml, parseHtmlDocument, purifyHtml, selectFirst } from "../src/feeds/index.js";


export default defineFeed({
  sourceKind: "page",
  url: "https://news.example.org/latest",
  title: "Example News",
  description: "Latest stories from news.example.org",
  itemsXpath: "//article[contains(@class,'story')]",
  itemLinkXpath: ".//h2/a/@href",
  itemLinkPrefix: "https://news.example.org",
  itemTitleXpath: ".//h2/a",
  itemTimeXpath: ".//time/@datetime",
  readability: false,
  itemTransform: (body, draft, ctx) => {
    const dom = parseHtmlDocument(body, ctx.url);
    const main = nodeHtml(selectFirst(dom, "//div[@id='story-body']"));
    if (main) draft.content = purifyHtml(main, { baseUrl: ctx.url, removeSelectors: [".share", ".related"] });
  },
});
