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

import { decodeAbiParameters, encodeAbiParameters, hexToBytes, type AbiParameter } from 'viem';
import { GuestAbort } from './error.js';

/**
 * Size in bytes of one head slot in the contract ABI encoding
 */
export const ABI_WORD_SIZE = 32;

/**
 * A runtime representation of a static Solidity ABI type
 */
export interface AbiType<A> {
  /**
   * The canonical Solidity name of the type, e.g. `uint256`
   */
  readonly name: string;

  /**
   * The exact length of an encoded value
   */
  readonly byteLength: number;

  /**
   * Converts this type's TypeScript representation to its canonical ABI encoding
   */
  encode(value: A): Uint8Array;

  /**
   * Converts a canonical ABI encoding to this type's TypeScript representation.
   * Strict: the buffer must hold exactly one encoded value and nothing else.
   *
   * @throws {@link GuestAbort} with fault `decode` if the buffer is malformed
   */
  decode(bytes: Uint8Array): A;
}

/**
 * Runtime type of the Solidity `uint<N>` types
 */
export class AbiTypeUnsignedInteger implements AbiType<bigint> {
  readonly name: string;
  readonly byteLength = ABI_WORD_SIZE;
  readonly maxValue: bigint;
  private readonly parameter: AbiParameter;

  constructor(bits: number) {
    if (!Number.isInteger(bits) || bits < 8 || bits > 256 || bits % 8 != 0) {
      throw new RangeError(`invalid unsigned integer width: ${bits}`);
    }
    this.name = `uint${bits}`;
    this.maxValue = (1n << BigInt(bits)) - 1n;
    this.parameter = { type: this.name };
  }

  encode(value: bigint): Uint8Array {
    if (value < 0n || value > this.maxValue) {
      throw new RangeError(`expected ${this.name}, got ${value}`);
    }
    return hexToBytes(encodeAbiParameters([this.parameter], [value]));
  }

  decode(bytes: Uint8Array): bigint {
    if (bytes.length != this.byteLength) {
      throw new GuestAbort('decode', `expected ${this.byteLength} bytes for ${this.name}, got ${bytes.length}`);
    }
    let decoded: unknown;
    try {
      [decoded] = decodeAbiParameters([this.parameter], bytes);
    } catch (err) {
      throw new GuestAbort('decode', `malformed ${this.name}`, { cause: err });
    }
    // viem hands back a `number` for widths up to 48 bits
    const value = typeof decoded == 'number' ? BigInt(decoded) : decoded;
    if (typeof value != 'bigint' || value > this.maxValue) {
      throw new GuestAbort('decode', `expected ${this.name}`);
    }
    return value;
  }
}

export const AbiTypeUint256 = new AbiTypeUnsignedInteger(256);
