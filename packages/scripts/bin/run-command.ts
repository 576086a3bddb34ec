#!/usr/bin/env node

/**
 * run-command - Mock network-device command runner
 *
 * USAGE:
 *   run-command -device_ip <ip> [-command "<text>"] [-save]
 *   run-command -list
 *
 * See src/run-command.ts for behaviour and exit codes.
 *
 * Run from the repository root with `npm run run-command -- <args>`.
 */

import 'dotenv/config';
import { INTERRUPT_MESSAGE, RUN_COMMAND_NAME, runCommand } from '../src/run-command.js';
import { startScript } from '../src/runtime.js';

startScript(RUN_COMMAND_NAME, runCommand, { interruptMessage: INTERRUPT_MESSAGE });
