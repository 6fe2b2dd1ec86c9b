/**
 * 프로세스를 띄우지 않는 CommandRunner
 * 명령별 핸들러가 파일을 만들어 외부 도구의 결과를 흉내낸다.
 */

import { CommandResult, CommandRunner, RunOptions } from '../core/shared/process-utils';

export type CommandHandler = (
  args: string[],
  options: RunOptions
) => Promise<Partial<CommandResult> | void> | Partial<CommandResult> | void;

export interface RecordedCall {
  command: string;
  args: string[];
  options: RunOptions;
}

export class FakeRunner implements CommandRunner {
  readonly calls: RecordedCall[] = [];
  private handlers = new Map<string, CommandHandler>();
  private available: Set<string>;

  /** available: which() 로 찾을 수 있는 명령 또는 절대 경로 */
  constructor(available: string[] = []) {
    this.available = new Set(available);
  }

  on(command: string, handler: CommandHandler): this {
    this.handlers.set(command, handler);
    this.available.add(command);
    return this;
  }

  makeAvailable(command: string): this {
    this.available.add(command);
    return this;
  }

  async run(command: string, args: string[], options: RunOptions = {}): Promise<CommandResult> {
    this.calls.push({ command, args, options });
    const handler = this.handlers.get(command);
    if (!handler) {
      throw new Error(`spawn ${command} ENOENT`);
    }
    const result = await handler(args, options);
    return {
      exitCode: result?.exitCode ?? 0,
      stdout: result?.stdout ?? '',
      stderr: result?.stderr ?? '',
    };
  }

  async which(command: string): Promise<string | null> {
    if (!this.available.has(command)) return null;
    return command.includes('/') ? command : `/usr/bin/${command}`;
  }

  callsOf(command: string): RecordedCall[] {
    return this.calls.filter((call) => call.command === command);
  }
}
