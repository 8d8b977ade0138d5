#!/usr/bin/env node
// SPDX-License-Identifier: AGPL-3.0-only
// Copyright (C) 2025 Alexey Pelykh

import { loadEnvironmentFile } from "@chatvault/core";

import { createProgram } from "./program.js";

loadEnvironmentFile();
createProgram().parse();
