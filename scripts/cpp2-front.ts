#!/usr/bin/env node
import { cac } from 'cac';
import { lexCommand } from '../src/cli/commands/lex.js';
import { isParseFormat, parseCommand } from '../src/cli/commands/parse.js';
import { handleError } from '../src/cli/utils/error-handler.js';

function wrapAction<Args extends unknown[]>(fn: (...args: Args) => Promise<void> | void) {
  return async (...args: Args): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      handleError(error);
    }
  };
}

async function main(): Promise<void> {
  const cli = cac('cpp2-front');

  cli
    .command('lex <file>', '输出 cpp2 源文件的 token 段')
    .option('--json', '以 JSON 输出', { default: false })
    .action(
      wrapAction((file: string, options: { json?: boolean }) => {
        lexCommand(file, { json: Boolean(options.json) });
      })
    );

  cli
    .command('parse <file>', '解析 cpp2 源文件并输出语法树')
    .option('--format <format>', '输出格式：tree | source', { default: 'tree' })
    .option('--no-metafunctions', '不应用 @ 元函数')
    .action(
      wrapAction((file: string, options: { format?: string; metafunctions?: boolean }) => {
        const format = options.format ?? 'tree';
        if (!isParseFormat(format)) {
          throw new Error(`未知的输出格式：${format}（可选 tree、source）`);
        }
        parseCommand(file, { format, metafunctions: options.metafunctions !== false });
      })
    );

  cli.help();
  cli.version('0.1.0');
  cli.parse();
}

main().catch(handleError);
