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

/**
 * The stage of a guest execution that rejected its input
 */
export type GuestFault = 'decode' | 'predicate';

/**
 * An unrecoverable guest failure. Raising it ends the execution; the host only
 * ever observes that the execution aborted, never which fault caused it.
 */
export class GuestAbort extends Error {
  readonly fault: GuestFault;

  constructor(fault: GuestFault, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GuestAbort';
    this.fault = fault;
  }
}

/**
 * Aborts the execution with the given fault if `cond` is false
 */
export function assert(cond: boolean, fault: GuestFault, message: string): asserts cond {
  if (!cond) {
    throw new GuestAbort(fault, message);
  }
}
