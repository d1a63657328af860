#!/usr/bin/env node

/**
 * rulestudio CLI
 * Configuration studio for SwiftLint
 */

import { createProgram } from './program.js';

createProgram()
  .parseAsync()
  .catch((error: unknown) => {
    console.error('Error:', error);
    process.exit(1);
  });
