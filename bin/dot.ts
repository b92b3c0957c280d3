#!/usr/bin/env node

import { DOT_LABEL } from '../src/dispatch/index.js';
import { main } from './cli.js';

await main(DOT_LABEL, process.argv.slice(2));
