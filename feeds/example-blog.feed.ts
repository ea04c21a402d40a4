// 已有 RSS：只补全正文，付费文章在标题前加标记

import { defineFeed, detectPaywall } from "../src/feeds/index.js";


export default defineFeed({
  url: "https://blog.example.org/rss.xml",
  cacheKeyStripQuery: true,
  itemTransform: (body, draft) => {
    draft.title = detectPaywall(draft.title, body, 'class="paywall"');
  },
});
