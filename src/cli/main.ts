#!/usr/bin/env node

import 'dotenv/config';

import { createProgram } from './index.js';

await createProgram().parseAsync();
