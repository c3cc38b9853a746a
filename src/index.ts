#!/usr/bin/env node
import 'dotenv/config';
import { createCLI } from './cli/index.js';

await createCLI().parseAsync(process.argv);
