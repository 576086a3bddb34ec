#!/usr/bin/env node

/**
 * echo - Print the value of --echo / -ec
 */

import 'dotenv/config';
import { ECHO_NAME, echo } from '../src/echo.js';
import { startScript } from '../src/runtime.js';

startScript(ECHO_NAME, echo);
