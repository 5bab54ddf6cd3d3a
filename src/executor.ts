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

import type { Logger } from 'pino';
import { sha256, type Hex } from 'viem';
import { MemoryGuestEnv, type GuestProgram } from './guest-env.js';

/**
 * The outcome of one guest execution, as observed by the host
 */
export type ExecutionResult =
  | {
      status: 'success';
      /**
       * The public journal committed by the guest
       */
      journal: Uint8Array;
      /**
       * SHA-256 of {@link journal}
       */
      journalDigest: Hex;
    }
  | {
      status: 'aborted';
    };

export interface ExecuteOptions {
  logger?: Logger;
}

/**
 * Runs `guest` once against `input` in a fresh environment.
 *
 * Anything the guest throws aborts the execution. Aborted executions report
 * no journal and no reason: every failure looks the same to the caller.
 */
export function executeGuest(guest: GuestProgram, input: Uint8Array, options: ExecuteOptions = {}): ExecutionResult {
  const logger = options.logger;
  const env = new MemoryGuestEnv(input);
  logger?.debug({ inputLength: input.length }, 'executing guest');
  try {
    guest(env);
  } catch {
    logger?.debug('guest aborted');
    return { status: 'aborted' };
  }
  const journal = env.journal;
  logger?.debug({ journalLength: journal.length }, 'guest succeeded');
  return { status: 'success', journal, journalDigest: sha256(journal) };
}
