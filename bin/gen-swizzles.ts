#!/usr/bin/env tsx
/**
 * CLI entry point for gen-swizzles. Takes no arguments.
 *
 * Usage:
 *   gen-swizzles > swizzles.rs
 */

import "../generator/index.ts";
