#!/usr/bin/env node

import { SOURCE_LABEL } from '../src/dispatch/index.js';
import { main } from './cli.js';

await main(SOURCE_LABEL, process.argv.slice(2));
