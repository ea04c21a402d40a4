// 备用下载：借助第三方下载页，填入源地址提交表单，再从结果页找到下载链接保存到文件
// 供 feed 的 podcast.enclosureFallback 调用

import { parse } from "node-html-parser";
import type { HTMLElement } from "node-html-parser";
import type { Fetcher } from "../fetcher/types.js";
import { decodeBody } from "../fetcher/encoding.js";
import { logger } from "../logger/index.js";


export interface FormDownloadOptions {
  /** 下载页地址 */
  downloaderUrl: string;
  /** 提交按钮的文字、value、id 或 name */
  submitButton: string;
  /** 填写源地址的输入框 name */
  urlInput: string;
  /** 结果页中的下载链接：CSS 选择器，或链接文字 */
  resultLink: { by: "selector" | "text"; value: string };
  /** 需要下载的原始地址 */
  sourceUrl: string;
  destPath: string;
}


const BUTTON_SELECTOR = "button, input[type=submit], input[type=button], input[type=image]";


function matchesButton(el: HTMLElement, label: string): boolean {
  return [el.text.trim(), el.getAttribute("value"), el.getAttribute("id"), el.getAttribute("name")].some((v) => v === label);
}


/** 收集表单字段（不含按钮、文件、未勾选的单选与复选） */
function collectFields(form: HTMLElement): URLSearchParams {
  const fields = new URLSearchParams();
  for (const el of form.querySelectorAll("input, textarea, select")) {
    const name = el.getAttribute("name");
    if (!name) continue;
    const tag = el.tagName.toLowerCase();
    if (tag === "input") {
      const type = (el.getAttribute("type") ?? "text").toLowerCase();
      if (["submit", "button", "image", "file", "reset"].includes(type)) continue;
      if ((type === "checkbox" || type === "radio") && !el.hasAttribute("checked")) continue;
      fields.append(name, el.getAttribute("value") ?? (type === "checkbox" ? "on" : ""));
    } else if (tag === "textarea") {
      fields.append(name, el.text);
    } else {
      const option = el.querySelector("option[selected]") ?? el.querySelector("option");
      if (option) fields.append(name, option.getAttribute("value") ?? option.text.trim());
    }
  }
  return fields;
}


function findLink(root: HTMLElement, link: FormDownloadOptions["resultLink"]): string | null {
  if (link.by === "selector") {
    return root.querySelector(link.value)?.getAttribute("href") ?? null;
  }
  const anchor = root.querySelectorAll("a").find((a) => a.text.replace(/\s+/g, " ").trim().includes(link.value));
  return anchor?.getAttribute("href") ?? null;
}


function toHttpUrl(raw: string, base: string): string | null {
  try {
    const u = new URL(raw, base);
    return u.protocol === "http:" || u.protocol === "https:" ? u.toString() : null;
  } catch {
    return null;
  }
}


function withQuery(action: string, fields: URLSearchParams): string {
  const target = new URL(action);
  target.search = fields.toString();
  return target.toString();
}


/** 成功写入 destPath 时返回 true */
export async function downloadViaForm(fetcher: Fetcher, options: FormDownloadOptions): Promise<boolean> {
  const meta = { item_url: options.sourceUrl, downloader: options.downloaderUrl };
  const page = await fetcher.fetch(options.downloaderUrl);
  if (page.statusCode !== 200) {
    logger.warn("podcast", "下载页打不开", { ...meta, status: page.statusCode });
    return false;
  }
  const root = parse(decodeBody(page.body, page.contentType));
  const button = root.querySelectorAll(BUTTON_SELECTOR).find((el) => matchesButton(el, options.submitButton));
  const form = button?.closest("form");
  if (!button || !form) {
    logger.warn("podcast", "下载页中找不到表单", { ...meta, button: options.submitButton });
    return false;
  }

  const fields = collectFields(form);
  const buttonName = button.getAttribute("name");
  if (buttonName) fields.append(buttonName, button.getAttribute("value") ?? "");
  fields.set(options.urlInput, options.sourceUrl);
  const action = toHttpUrl(form.getAttribute("action") ?? "", page.finalUrl);
  if (!action) {
    logger.warn("podcast", "表单 action 无效", meta);
    return false;
  }
  const method = (form.getAttribute("method") ?? "GET").toUpperCase();
  const result = method === "POST"
    ? await fetcher.fetch(action, {
      method: "POST",
      body: fields.toString(),
      headers: { "Content-Type": "application/x-www-form-urlencoded" },
    })
    : await fetcher.fetch(withQuery(action, fields));
  if (result.statusCode !== 200) {
    logger.warn("podcast", "表单提交失败", { ...meta, status: result.statusCode });
    return false;
  }

  const href = findLink(parse(decodeBody(result.body, result.contentType)), options.resultLink);
  const downloadUrl = href ? toHttpUrl(href, result.finalUrl) : null;
  if (!downloadUrl) {
    logger.warn("podcast", "结果页中找不到下载链接", { ...meta, link: options.resultLink.value });
    return false;
  }
  const saved = await fetcher.fetchToFile(downloadUrl, options.destPath);
  if (saved.statusCode !== 200) {
    logger.warn("podcast", "备用下载失败", { ...meta, status: saved.statusCode });
    return false;
  }
  return true;
}
