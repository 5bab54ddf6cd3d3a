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

import { destination, pino, type Logger } from 'pino';
import { PinoPretty } from 'pino-pretty';
import { defaultConfig, type RuntimeConfig } from './config.js';

// Standard output carries the journal, so every log record goes to stderr.
const STDERR_FD = 2;

export const createLogger = (config: RuntimeConfig = defaultConfig): Logger => {
  const stream = config.prettyLogs
    ? PinoPretty({
        colorize: false,
        sync: true,
        destination: STDERR_FD,
      })
    : destination({ dest: STDERR_FD, sync: true });
  return pino(
    {
      name: 'guest',
      level: config.logLevel,
    },
    stream,
  );
};
