#!/usr/bin/env node
/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { main } from './cli/main.js';
import { reportFailure } from './cli/plain-reporter.js';

main().catch((error: unknown) => {
  reportFailure(error);
  process.exit(1);
});
