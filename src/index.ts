#!/usr/bin/env node

import { createProgram, handleError } from './cli.js';

createProgram().parseAsync().catch(handleError);
