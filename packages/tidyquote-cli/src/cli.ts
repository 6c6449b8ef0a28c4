#!/usr/bin/env node
/**
 * tidyquote CLI entry point
 */

import { buildProgram } from './program.js';

buildProgram().parse();
