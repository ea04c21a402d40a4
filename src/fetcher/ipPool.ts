// 出口 IP 池：从 outbound_ips.txt 加载一次，每次请求随机挑选一个

import { readFile } from "node:fs/promises";
import { BlockList, isIP } from "node:net";
import { logger, errMessage } from "../logger/index.js";


const RESERVED_V4: Array<[string, number]> = [
  ["0.0.0.0", 8],
  ["10.0.0.0", 8],
  ["100.64.0.0", 10],
  ["127.0.0.0", 8],
  ["169.254.0.0", 16],
  ["172.16.0.0", 12],
  ["192.0.0.0", 24],
  ["192.0.2.0", 24],
  ["192.168.0.0", 16],
  ["198.18.0.0", 15],
  ["198.51.100.0", 24],
  ["203.0.113.0", 24],
  ["224.0.0.0", 4],
  ["240.0.0.0", 4],
];


const RESERVED_V6: Array<[string, number]> = [
  ["::", 128],
  ["::1", 128],
  ["::ffff:0:0", 96],
  ["64:ff9b::", 96],
  ["100::", 64],
  ["2001:db8::", 32],
  ["fc00::", 7],
  ["fe80::", 10],
  ["ff00::", 8],
];


const reserved = new BlockList();
for (const [net, prefix] of RESERVED_V4) reserved.addSubnet(net, prefix, "ipv4");
for (const [net, prefix] of RESERVED_V6) reserved.addSubnet(net, prefix, "ipv6");


/** 是否为可用于出口绑定的公网地址 */
export function isPublicIp(address: string): boolean {
  const family = isIP(address);
  if (family === 0) return false;
  return !reserved.check(address, family === 4 ? "ipv4" : "ipv6");
}


export class OutboundIpPool {
  constructor(
    private readonly addresses: readonly string[],
    private readonly random: () => number = Math.random
  ) {}

  /** 解析文本：每行一个地址，忽略空行与 # 注释，非公网地址打警告丢弃 */
  static parse(text: string, random?: () => number): OutboundIpPool {
    const out: string[] = [];
    for (const line of text.split(/\r?\n/)) {
      const address = line.replace(/#.*$/, "").trim();
      if (!address) continue;
      if (isPublicIp(address)) {
        out.push(address);
      } else {
        logger.warn("fetcher", "忽略无效或非公网的出口 IP", { address });
      }
    }
    return new OutboundIpPool(out, random);
  }

  /** 加载文件；不存在时返回空池（使用系统默认出口） */
  static async load(path: string, random?: () => number): Promise<OutboundIpPool> {
    let text: string;
    try {
      text = await readFile(path, "utf-8");
    } catch (err) {
      if (!(err instanceof Error && "code" in err && err.code === "ENOENT")) {
        logger.warn("fetcher", "读取出口 IP 列表失败", { path, err: errMessage(err) });
      }
      return new OutboundIpPool([], random);
    }
    const pool = OutboundIpPool.parse(text, random);
    logger.info("fetcher", "出口 IP 池已加载", { count: pool.size });
    return pool;
  }

  get size(): number {
    return this.addresses.length;
  }

  /** 均匀随机挑选；空池返回 null */
  pick(): string | null {
    if (this.addresses.length === 0) return null;
    const i = Math.min(this.addresses.length - 1, Math.floor(this.random() * this.addresses.length));
    return this.addresses[i] ?? null;
  }
}
