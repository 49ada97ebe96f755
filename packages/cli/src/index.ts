#!/usr/bin/env -S npx tsx
/**
 * Fireside CLI
 */

import { config as loadEnv } from 'dotenv';
import { createProgram } from './program.js';

// Load environment variables from .env
loadEnv();

await createProgram().parseAsync();
