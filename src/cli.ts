#!/usr/bin/env node
import {main} from './main';
import {EventType, logEvent} from './system/logging';

main(process.argv.slice(2)).then(
  code => {
    process.exitCode = code;
  },
  (e: unknown) => {
    logEvent(EventType.ERROR, {
      category: 'uncaught error',
      detail: e instanceof Error ? e.stack ?? e.message : String(e),
    });
    process.exitCode = 1;
  },
);
