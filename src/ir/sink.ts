/**
 * 打印器的输出端。
 *
 * `write` 抛出的异常原样向上传播，打印器不做任何捕获或重试。
 */
export interface TextSink {
  write(fragment: string): void;
}

/** 在内存中累积片段，用于日志与测试断言 */
export class StringSink implements TextSink {
  private readonly parts: string[] = [];

  write(fragment: string): void {
    this.parts.push(fragment);
  }

  toString(): string {
    return this.parts.join('');
  }
}
