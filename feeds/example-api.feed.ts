// JSON 接口：列表只有标题与链接，正文从单独的详情接口读取

import { defineFeed, getPath } from "../src/feeds/index.js";


export default defineFeed({
  sourceKind: "json",
  url: "https://api.example.org/v1/posts?limit=20",
  title: "Example API",
  json: {
    items: (data) => {
      const posts = getPath(data, "data.posts");
      return Array.isArray(posts) ? posts : [];
    },
    link: "permalink",
    title: "title",
    time: "published_at",
    jsonUrl: (item) => {
      const id = getPath(item, "id");
      return typeof id === "number" || typeof id === "string" ? `https://api.example.org/v1/posts/${id}` : null;
    },
    itemTransform: (data, draft) => {
      const html = getPath(data, "data.body_html");
      if (typeof html === "string") draft.content = html;
    },
  },
});
