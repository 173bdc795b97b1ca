#!/usr/bin/env -S node --import tsx
// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { describeError } from "@phase-deuce/daily-log";
import { EXIT_CODES, main } from "./index.js";

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    process.stderr.write(`phase-deuce: ${describeError(error)}\n`);
    process.exitCode = EXIT_CODES.failure;
  },
);
