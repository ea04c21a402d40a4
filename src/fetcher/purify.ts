// 基于 node-html-parser 的正文净化：去掉脚本、样式、注释等与阅读无关的部分，相对链接补成绝对地址

import { parse, NodeType } from "node-html-parser";
import type { HTMLElement, Node } from "node-html-parser";


const DEFAULT_TAGS_TO_REMOVE = [
  "script", "style", "svg", "link", "meta",
  "input", "button", "select", "textarea",
  "nav", "iframe", "noscript", "template", "object", "canvas", "form",
];


const BASE64_IMG_PATTERN = /^data:image\/[^;"'\s]+;base64,/i;


const URL_ATTRIBUTES = ["href", "src", "poster"];


export interface PurifyOptions {
  /** 相对链接的基准 URL */
  baseUrl?: string;
  /** 额外删除的 CSS 选择器（广告、分享栏等） */
  removeSelectors?: string[];
  /** 覆盖默认删除的标签 */
  removeTags?: string[];
}


function collectCommentNodes(node: Node, out: Node[]): void {
  if (node.nodeType === NodeType.COMMENT_NODE) {
    out.push(node);
    return;
  }
  for (const child of node.childNodes) {
    collectCommentNodes(child, out);
  }
}


function absolutize(value: string, baseUrl: string): string {
  try {
    return new URL(value, baseUrl).toString();
  } catch {
    return value;
  }
}


function rewriteAttributes(root: HTMLElement, baseUrl: string | undefined): void {
  for (const elem of root.querySelectorAll("*")) {
    elem.removeAttribute("class");
    elem.removeAttribute("style");
    const src = elem.getAttribute("src");
    if (src && BASE64_IMG_PATTERN.test(src)) {
      elem.removeAttribute("src");
    }
    if (!baseUrl) continue;
    for (const attr of URL_ATTRIBUTES) {
      const v = elem.getAttribute(attr);
      if (v && !v.startsWith("#") && !/^(data|mailto|javascript):/i.test(v)) {
        elem.setAttribute(attr, absolutize(v, baseUrl));
      }
    }
  }
}


/** 净化 HTML 片段，返回字符串 */
export function purifyHtml(html: string, options: PurifyOptions = {}): string {
  const root = parse(html, { comment: true });
  const selectors = [...(options.removeTags ?? DEFAULT_TAGS_TO_REMOVE), ...(options.removeSelectors ?? [])];
  for (const selector of selectors) {
    for (const el of root.querySelectorAll(selector)) {
      el.remove();
    }
  }
  const comments: Node[] = [];
  collectCommentNodes(root, comments);
  for (const node of comments) {
    node.remove();
  }
  rewriteAttributes(root, options.baseUrl);
  return root.toString().trim();
}
