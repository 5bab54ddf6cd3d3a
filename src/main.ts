// This file is part of Compact.
// Copyright (C) 2025 Midnight Foundation
// SPDX-License-Identifier: Apache-2.0
// Licensed under the Apache License, Version 2.0 (the "License");
// you may not use this file except in compliance with the License.
// You may obtain a copy of the License at
//
// 	http://www.apache.org/licenses/LICENSE-2.0
//
// Unless required by applicable law or agreed to in writing, software
// distributed under the License is distributed on an "AS IS" BASIS,
// WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
// See the License for the specific language governing permissions and
// limitations under the License.

import * as fs from 'node:fs';
import type { Logger } from 'pino';
import { loadConfig } from './config.js';
import { executeGuest } from './executor.js';
import type { GuestProgram } from './guest-env.js';
import { expectedValueGuest } from './guest.js';
import { createLogger } from './logger.js';

export enum ExitCodes {
  Success = 0,
  Abort = 1,
}

/**
 * The host side of the process: where input comes from and where the journal goes
 */
export interface HostIo {
  read(): Uint8Array;
  write(bytes: Uint8Array): void;
}

/**
 * Reads standard input to completion and writes the journal to standard output
 */
export const processIo: HostIo = {
  read(): Uint8Array {
    return fs.readFileSync(0);
  },
  write(bytes: Uint8Array): void {
    let offset = 0;
    while (offset < bytes.length) {
      offset += fs.writeSync(1, bytes, offset);
    }
  },
};

export interface MainOptions {
  guest?: GuestProgram;
  logger?: Logger;
}

/**
 * Runs a guest over the whole input of `io` and writes its journal back on
 * success. Nothing is written when the guest aborts.
 */
export function main(io: HostIo = processIo, options: MainOptions = {}): ExitCodes {
  const logger = options.logger ?? createLogger(loadConfig());
  const result = executeGuest(options.guest ?? expectedValueGuest, io.read(), { logger });
  if (result.status === 'aborted') {
    logger.warn('execution aborted');
    return ExitCodes.Abort;
  }
  io.write(result.journal);
  logger.info({ journalDigest: result.journalDigest }, 'journal committed');
  return ExitCodes.Success;
}
