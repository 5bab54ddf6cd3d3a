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

import { concatBytes } from 'viem';

/**
 * The channels a guest program can reach from within an execution
 */
export interface GuestEnv {
  /**
   * Reads the input channel to completion. The channel is exhausted afterwards;
   * a second call returns no bytes.
   */
  readInput(): Uint8Array;
  /**
   * Appends a slice to the public journal
   */
  commit(bytes: Uint8Array): void;
}

/**
 * A guest program: everything it observes comes through `env`, and failing
 * is signalled by throwing
 */
export type GuestProgram = (env: GuestEnv) => void;

/**
 * A {@link GuestEnv} backed by in-memory buffers
 */
export class MemoryGuestEnv implements GuestEnv {
  private input: Uint8Array;
  private readonly slices: Uint8Array[] = [];

  constructor(input: Uint8Array) {
    this.input = new Uint8Array(input);
  }

  readInput(): Uint8Array {
    const res = this.input;
    this.input = new Uint8Array(0);
    return res;
  }

  commit(bytes: Uint8Array): void {
    this.slices.push(new Uint8Array(bytes));
  }

  /**
   * The concatenation of every committed slice, in commit order
   */
  get journal(): Uint8Array {
    return concatBytes(this.slices);
  }

  /**
   * Whether anything has been committed
   */
  get committed(): boolean {
    return this.slices.length > 0;
  }
}
