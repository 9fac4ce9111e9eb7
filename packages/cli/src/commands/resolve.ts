import type { Config } from '@lp-builds/shared';
import { BoardResolver } from '@lp-builds/launchpad';
import { loadCatalog } from '../config-loader.js';
import { printJson } from '../context.js';
import { formatTarget } from '../format.js';

export function resolveCommand(
  config: Config,
  board: string,
  system: string,
  options: { arch?: string; json?: boolean },
): void {
  const resolver = new BoardResolver({ catalog: loadCatalog(config) });
  const target = resolver.resolve(board, system, options.arch);

  if (options.json) {
    printJson(target);
    return;
  }
  for (const line of formatTarget(target)) console.log(line);
}
