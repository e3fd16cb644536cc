#!/usr/bin/env node
/**
 * pixeldiff CLI - perceptual pixel diff of two PNG images.
 *
 * Exit codes: 0 identical, 66 images differ, 65 dimension mismatch, 1 other errors.
 */

import { createProgram } from './cli/program.js';

await createProgram().parseAsync();
