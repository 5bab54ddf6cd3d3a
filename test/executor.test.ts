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

import { createHash } from 'node:crypto';
import { pino } from 'pino';
import { describe, expect, test } from 'vitest';
import { executeGuest, expectedValueGuest, type GuestProgram } from '../src/index.js';
import { silentLogger, word } from './util.js';

const run = (input: Uint8Array) => executeGuest(expectedValueGuest, input, { logger: silentLogger });

describe('executeGuest', () => {
  test('Check for success', () => {
    const result = run(word(12345n));
    expect(result.status).toBe('success');
    if (result.status === 'success') {
      expect(result.journal).toEqual(word(12345n));
    }
  });

  test('Check journal digest is SHA-256 of the journal', () => {
    const result = run(word(12345n));
    const digest = '0x' + createHash('sha256').update(word(12345n)).digest('hex');
    expect(result).toEqual({ status: 'success', journal: word(12345n), journalDigest: digest });
  });

  test.each([
    ['a different value', word(12344n)],
    ['zero', word(0n)],
    ['an empty buffer', new Uint8Array(0)],
    ['a short buffer', new Uint8Array(31)],
    ['a long buffer', new Uint8Array(33)],
  ])('Check %s aborts with nothing else reported', (_, input) => {
    expect(run(input)).toEqual({ status: 'aborted' });
  });

  test('Check repeated executions commit identical journals', () => {
    const first = run(word(12345n));
    const second = run(word(12345n));
    expect(second).toEqual(first);
  });

  test('Check any thrown error aborts', () => {
    const guest: GuestProgram = () => {
      throw new TypeError('boom');
    };
    expect(executeGuest(guest, new Uint8Array(0), { logger: silentLogger })).toEqual({ status: 'aborted' });
  });

  test('Check journal committed before an abort is discarded', () => {
    const guest: GuestProgram = (env) => {
      env.commit(new Uint8Array([1]));
      throw new Error('late failure');
    };
    expect(executeGuest(guest, new Uint8Array(0))).toEqual({ status: 'aborted' });
  });

  test('Check executions do not share state', () => {
    const guest: GuestProgram = (env) => env.commit(env.readInput());
    const a = executeGuest(guest, new Uint8Array([1]));
    const b = executeGuest(guest, new Uint8Array([2]));
    expect(a).toMatchObject({ status: 'success', journal: new Uint8Array([1]) });
    expect(b).toMatchObject({ status: 'success', journal: new Uint8Array([2]) });
  });

  test('Check decode and predicate aborts log the same record', () => {
    const abortRecords = (input: Uint8Array): unknown[] => {
      const lines: string[] = [];
      const logger = pino(
        { level: 'debug', base: null, timestamp: false },
        { write: (line: string) => lines.push(line) },
      );
      executeGuest(expectedValueGuest, input, { logger });
      return lines.map((line): unknown => JSON.parse(line)).filter((record) => {
        return typeof record == 'object' && record !== null && 'msg' in record && record.msg === 'guest aborted';
      });
    };
    expect(abortRecords(new Uint8Array(31))).toEqual([{ level: 20, msg: 'guest aborted' }]);
    expect(abortRecords(word(12344n))).toEqual([{ level: 20, msg: 'guest aborted' }]);
  });
});
