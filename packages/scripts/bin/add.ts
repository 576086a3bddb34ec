#!/usr/bin/env node

/**
 * add - Add two integers
 *
 * USAGE:
 *   add --num1 <int> --num2 <int>
 *   add -N1 <int> -N2 <int>
 */

import 'dotenv/config';
import { ADD_NAME, add } from '../src/add.js';
import { startScript } from '../src/runtime.js';

startScript(ADD_NAME, add);
