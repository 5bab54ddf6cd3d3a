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

import { type AbiType, AbiTypeUint256 } from './abi-types.js';
import { assert } from './error.js';
import type { GuestProgram } from './guest-env.js';

/**
 * The value the expected-value guest accepts. Fixed at build time.
 */
export const EXPECTED_VALUE = 12345n;

/**
 * A pure, side-effect-free check on a decoded guest input
 */
export type Predicate<A> = (value: A) => boolean;

/**
 * Builds the predicate that holds exactly for `expected`
 */
export const equals =
  (expected: bigint): Predicate<bigint> =>
  (value) =>
    value === expected;

/**
 * Builds a guest that decodes its whole input as one `type` value, aborts
 * unless `predicate` holds, and commits the re-encoded value.
 *
 * @typeparam A The TypeScript representation of the decoded value.
 */
export function definePredicateGuest<A>(type: AbiType<A>, predicate: Predicate<A>): GuestProgram {
  return (env) => {
    const value = type.decode(env.readInput());
    assert(predicate(value), 'predicate', `${type.name} input rejected by predicate`);
    env.commit(type.encode(value));
  };
}

/**
 * Commits its input if it is the ABI encoding of {@link EXPECTED_VALUE}, and
 * aborts otherwise
 */
export const expectedValueGuest: GuestProgram = definePredicateGuest(AbiTypeUint256, equals(EXPECTED_VALUE));
