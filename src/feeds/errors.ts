// feed 配置错误：只有这两类会中断一次请求，router 捕获后返回对应状态码

export class FeedConfigError extends Error {
  constructor(
    readonly feedName: string,
    detail: string
  ) {
    super(`Feed "${feedName}": ${detail}`);
    this.name = "FeedConfigError";
  }
}


export class FeedNotFoundError extends Error {
  constructor(readonly feedName: string) {
    super(`Feed "${feedName}" 不存在`);
    this.name = "FeedNotFoundError";
  }
}
