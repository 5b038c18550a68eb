import { nowSeconds } from '@pulsewatch/records';

import { loadConfig } from './config';
import { exitCodeForError, toErrorMessage } from './errors';
import { logger } from './logger';
import { LogNotifier } from './notify/notifier';
import { runInvocation } from './scheduler/invocation';
import { FileResultStore } from './store/results';
import { FileTransitionStateStore } from './store/transition-state';

async function main(argv: readonly string[]): Promise<number> {
  const configPath = argv[0] ?? 'config.yaml';

  try {
    const config = await loadConfig(configPath);
    const names = new Map(config.checks.map((c) => [c.id, c.name] as const));

    await runInvocation(config, {
      store: new FileResultStore(config.settings.data_dir, logger),
      stateStore: new FileTransitionStateStore(config.settings.state_path),
      notifier: new LogNotifier(logger, names),
      logger,
      clock: nowSeconds,
      env: process.env,
    });
    return 0;
  } catch (err) {
    const code = exitCodeForError(err);
    logger.fatal({ err: toErrorMessage(err), exit_code: code }, 'invocation failed');
    return code;
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  });
