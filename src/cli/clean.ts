// 清理命令：按各 feed 的 cacheLimit 删除过期缓存并 VACUUM，打印前后大小

import "dotenv/config";
import { humanFilesize } from "../janitor/index.js";
import { logger, errMessage } from "../logger/index.js";
import { RefeedService } from "../service.js";


async function main(): Promise<void> {
  const service = await RefeedService.create();
  try {
    const report = await service.clean();
    for (const [feed, count] of Object.entries(report.expired)) {
      const orphans = report.orphaned[feed];
      console.log(orphans ? `${feed}: 删除 ${count} 条，无正文媒体 ${orphans} 条` : `${feed}: 删除 ${count} 条`);
    }
    console.log(`数据库: ${humanFilesize(report.before.bytes)} → ${humanFilesize(report.after.bytes)}`);
    console.log(`条目数: ${report.before.rows} → ${report.after.rows}`);
  } finally {
    await service.close();
  }
}


main().catch((err) => {
  logger.error("janitor", "清理失败", { err: errMessage(err) });
  process.exit(1);
});
