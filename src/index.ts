#!/usr/bin/env node

import { config } from 'dotenv';

// Load environment variables from .env file
config();

// Import the CLI after the environment is loaded
const { main } = await import('./cli.js');
process.exitCode = await main(process.argv.slice(2));
