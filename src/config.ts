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

import type { LevelWithSilent } from 'pino';

const LOG_LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export interface RuntimeConfig {
  /**
   * Minimum level of emitted log records
   */
  logLevel: LevelWithSilent;
  /**
   * Whether log records are rendered with pino-pretty instead of as JSON lines
   */
  prettyLogs: boolean;
}

export const defaultConfig: RuntimeConfig = {
  logLevel: 'warn',
  prettyLogs: false,
};

const isLogLevel = (value: string): value is LevelWithSilent => LOG_LEVELS.some((level) => level === value);

/**
 * Reads the runtime configuration from environment variables. Unset or
 * unrecognised values fall back to {@link defaultConfig}.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const level = env.GUEST_LOG_LEVEL?.trim().toLowerCase();
  const pretty = env.GUEST_LOG_PRETTY?.trim().toLowerCase();
  return {
    logLevel: level !== undefined && isLogLevel(level) ? level : defaultConfig.logLevel,
    prettyLogs: pretty === undefined ? defaultConfig.prettyLogs : pretty === '1' || pretty === 'true',
  };
}
