// 正文提取结果与提取器接口

export interface ExtractedArticle {
  title: string;
  content: string;
}


/** 正文提取能力：输入 HTML，输出标题与正文；无法解析时返回 null */
export interface ContentExtractor {
  extract(html: string, url: string): ExtractedArticle | null;
}
