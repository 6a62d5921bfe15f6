#!/usr/bin/env node

import { handle, run } from '@oclif/core';
import { ProcessUtils } from './utils/ProcessUtils';

// running plugin scripts must not outlive an interrupted command
process.on('SIGINT', () => {
  void ProcessUtils.killAll('SIGINT').finally(() => process.exit(1));
});

run(process.argv.slice(2), __dirname).catch(handle);
