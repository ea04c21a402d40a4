// XPath 工具：基于 jsdom 解析 XML/HTML，按 XPath 取节点，原地替换为 CDATA

import { JSDOM } from "jsdom";
import { logger, errMessage } from "../logger/index.js";


export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';


/** 解析 XML；格式错误返回 null */
export function parseXmlDocument(xml: string): JSDOM | null {
  try {
    const dom = new JSDOM(xml, { contentType: "application/xml" });
    if (dom.window.document.getElementsByTagName("parsererror").length > 0) return null;
    return dom;
  } catch (err) {
    logger.debug("feeder", "XML 解析失败", { err: errMessage(err) });
    return null;
  }
}


/** 解析 HTML（容错，不会失败） */
export function parseHtmlDocument(html: string, url?: string): JSDOM {
  return url ? new JSDOM(html, { url }) : new JSDOM(html);
}


/** 按 XPath 选取节点；表达式无效时记警告并返回空数组 */
export function selectNodes(
  dom: JSDOM,
  expression: string,
  context?: Node,
  namespaces: Readonly<Record<string, string>> = {}
): Node[] {
  const doc = dom.window.document;
  const resolver = Object.keys(namespaces).length > 0
    ? { lookupNamespaceURI: (prefix: string | null) => (prefix ? namespaces[prefix] ?? null : null) }
    : null;
  try {
    const snapshot = doc.evaluate(expression, context ?? doc, resolver, dom.window.XPathResult.ORDERED_NODE_SNAPSHOT_TYPE, null);
    const nodes: Node[] = [];
    for (let i = 0; i < snapshot.snapshotLength; i++) {
      const node = snapshot.snapshotItem(i);
      if (node) nodes.push(node);
    }
    return nodes;
  } catch (err) {
    logger.warn("feeder", "XPath 查询失败", { expression, err: errMessage(err) });
    return [];
  }
}


/** 第一个匹配节点 */
export function selectFirst(
  dom: JSDOM,
  expression: string,
  context?: Node,
  namespaces?: Readonly<Record<string, string>>
): Node | null {
  return selectNodes(dom, expression, context, namespaces)[0] ?? null;
}


/** 节点文本（属性节点取值） */
export function nodeText(node: Node | null): string {
  return node?.textContent ?? "";
}


function isElement(node: Node): node is Element {
  return node.nodeType === 1;
}


/** 元素取 innerHTML，其它节点取文本 */
export function nodeHtml(node: Node | null): string {
  if (!node) return "";
  return isElement(node) ? node.innerHTML : node.textContent ?? "";
}


/** "]]>" 不能出现在 CDATA 中，拆成多段 */
export function splitCdata(text: string): string[] {
  const pieces = text.split("]]>");
  return pieces.map((p, i) => (i > 0 ? ">" : "") + p + (i < pieces.length - 1 ? "]]" : ""));
}


/** 把节点的全部子节点替换为 CDATA */
export function replaceContentCdata(node: Node, text: string): void {
  const doc = node.ownerDocument;
  if (!doc) return;
  while (node.firstChild) node.removeChild(node.firstChild);
  for (const part of splitCdata(text)) {
    node.appendChild(doc.createCDATASection(part));
  }
}


/** 序列化 XML 文档并补上 UTF-8 声明 */
export function serializeXml(dom: JSDOM): string {
  return `${XML_DECLARATION}\n${dom.serialize()}`;
}
