import { describe, it, expect, vi, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import * as iconv from "iconv-lite";
import { CookieStore, OutboundIpPool, decodeBody, detectEncoding, isPublicIp, rewriteXmlEncoding } from "../src/fetcher/index.js";
import { charsetFromContentType } from "../src/fetcher/encoding.js";
import { logger } from "../src/logger/index.js";


describe("编码检测", () => {
  it("Content-Type 的 charset 优先于文档声明", () => {
    const body = Buffer.from('<?xml version="1.0" encoding="ISO-8859-1"?><a/>');
    expect(detectEncoding(body, "text/xml; charset=UTF-8")).toBe("utf-8");
    expect(detectEncoding(body, "text/xml")).toBe("iso-8859-1");
  });

  it("BOM 优先于一切", () => {
    expect(detectEncoding(Buffer.from([0xef, 0xbb, 0xbf, 0x61]), "text/html; charset=gbk")).toBe("utf-8");
    expect(detectEncoding(Buffer.from([0xff, 0xfe, 0x61, 0x00]))).toBe("utf-16le");
  });

  it("从 <meta charset> 读取编码并转码", () => {
    const html = '<html><head><meta charset="gbk"></head><body>中文</body></html>';
    const body = iconv.encode(html, "gbk");
    expect(detectEncoding(body, "text/html")).toBe("gbk");
    expect(decodeBody(body, "text/html")).toBe(html);
  });

  it("无声明时按 UTF-8 合法性判断，不合法按 windows-1252", () => {
    expect(detectEncoding(Buffer.from("héllo", "utf-8"))).toBe("utf-8");
    expect(detectEncoding(Buffer.from([0x68, 0xe9, 0x6c]))).toBe("windows-1252");
    expect(decodeBody(Buffer.from([0x93, 0x68, 0x69, 0x94]))).toBe("“hi”");
  });

  it("声明 UTF-8 但内容不合法时按 windows-1252", () => {
    expect(detectEncoding(Buffer.from([0x68, 0xe9]), "text/html; charset=utf-8")).toBe("windows-1252");
  });

  it("解码时去掉 BOM", () => {
    expect(decodeBody(Buffer.from([0xef, 0xbb, 0xbf, 0x61, 0x62]))).toBe("ab");
  });

  it("charset 别名与未知编码", () => {
    expect(charsetFromContentType('text/html; charset="utf8"')).toBe("utf-8");
    expect(charsetFromContentType("text/html; charset=x-unknown-enc")).toBeNull();
    expect(charsetFromContentType(undefined)).toBeNull();
  });

  it("改写 XML 声明中的 encoding", () => {
    expect(rewriteXmlEncoding("<?xml version='1.0' encoding='windows-1251'?><rss/>")).toBe("<?xml version='1.0' encoding='UTF-8'?><rss/>");
    expect(rewriteXmlEncoding("<rss/>")).toBe("<rss/>");
  });
});


describe("出口 IP 池", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("只接受公网地址", () => {
    expect(isPublicIp("8.8.8.8")).toBe(true);
    expect(isPublicIp("2606:4700::1111")).toBe(true);
    expect(isPublicIp("10.1.2.3")).toBe(false);
    expect(isPublicIp("192.168.0.1")).toBe(false);
    expect(isPublicIp("127.0.0.1")).toBe(false);
    expect(isPublicIp("fe80::1")).toBe(false);
    expect(isPublicIp("not-an-ip")).toBe(false);
  });

  it("解析文件内容：忽略注释与空行，丢弃非公网地址并警告", () => {
    const warn = vi.spyOn(logger, "warn").mockImplementation(() => {});
    const pool = OutboundIpPool.parse("# outbound\n8.8.8.8\n\n10.0.0.1\n1.1.1.1 # cloudflare\n");
    expect(pool.size).toBe(2);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith("fetcher", "忽略无效或非公网的出口 IP", { address: "10.0.0.1" });
  });

  it("按随机数均匀挑选，空池返回 null", () => {
    const values = [0, 0.49, 0.5, 0.999];
    let i = 0;
    const pool = new OutboundIpPool(["8.8.8.8", "1.1.1.1"], () => values[i++] ?? 0);
    expect([pool.pick(), pool.pick(), pool.pick(), pool.pick()]).toEqual(["8.8.8.8", "8.8.8.8", "1.1.1.1", "1.1.1.1"]);
    expect(new OutboundIpPool([]).pick()).toBeNull();
  });

  it("文件不存在时为空池", async () => {
    const pool = await OutboundIpPool.load(join(tmpdir(), "refeed-missing-ips.txt"));
    expect(pool.size).toBe(0);
  });
});


describe("CookieStore", () => {
  it("保存 Set-Cookie 并在同域请求中带上", async () => {
    const store = CookieStore.memory();
    await store.store(["sid=abc; Path=/", "lang=en; Path=/"], "https://shop.example.org/login");
    expect(await store.cookieHeader("https://shop.example.org/cart")).toBe("sid=abc; lang=en");
    expect(await store.cookieHeader("https://other.example.org/")).toBe("");
  });

  it("写回文件后可重新加载", async () => {
    const dir = await mkdtemp(join(tmpdir(), "refeed-cookies-"));
    try {
      const path = join(dir, "cookies.json");
      const store = await CookieStore.load(path);
      await store.store(["sid=abc; Path=/; Max-Age=3600"], "https://shop.example.org/");
      await store.save();
      expect(JSON.parse(await readFile(path, "utf-8"))).toHaveProperty("cookies");
      const reloaded = await CookieStore.load(path);
      expect(await reloaded.cookieHeader("https://shop.example.org/")).toBe("sid=abc");
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("文件损坏时从空 jar 开始", async () => {
    const dir = await mkdtemp(join(tmpdir(), "refeed-cookies-"));
    try {
      const path = join(dir, "cookies.json");
      await writeFile(path, "{broken");
      vi.spyOn(logger, "warn").mockImplementation(() => {});
      const store = await CookieStore.load(path);
      expect(await store.cookieHeader("https://shop.example.org/")).toBe("");
    } finally {
      vi.restoreAllMocks();
      await rm(dir, { recursive: true, force: true });
    }
  });
});
