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

import { pino } from 'pino';
import { GuestAbort, type GuestFault } from '../src/index.js';

export const silentLogger = pino({ level: 'silent' });

/**
 * Big-endian, zero-padded 32-byte word, built without the codec under test
 */
export function word(value: bigint): Uint8Array {
  const res = new Uint8Array(32);
  let rest = value;
  for (let i = 31; i >= 0; i--) {
    res[i] = Number(rest & 0xffn);
    rest >>= 8n;
  }
  return res;
}

/**
 * Runs `f` and returns the fault of the {@link GuestAbort} it raised
 */
export function faultOf(f: () => void): GuestFault | undefined {
  try {
    f();
  } catch (err) {
    if (err instanceof GuestAbort) {
      return err.fault;
    }
    throw err;
  }
  return undefined;
}
