// 使用 Readability 从详情页 HTML 提取正文

import { JSDOM } from "jsdom";
import { Readability } from "@mozilla/readability";
import type { ContentExtractor, ExtractedArticle } from "./types.js";


export class ReadabilityExtractor implements ContentExtractor {
  extract(html: string, url: string): ExtractedArticle | null {
    const dom = new JSDOM(html, { url });
    try {
      const article = new Readability(dom.window.document).parse();
      if (!article) return null;
      return {
        title: article.title ?? "",
        content: article.content ?? "",
      };
    } finally {
      dom.window.close();
    }
  }
}
