#!/usr/bin/env node
/**
 * Bootstrap entry point.
 *
 * Compiled to dist/bootstrap.js. Paths in the configuration resolve against the directory above
 * this file, where the manifest, environment and application live.
 *
 * @module bootstrap
 */

import * as path from 'node:path'

import {createDefaultDeps, main} from './lib/bootstrap/index.js'
import {moduleDirectory} from './utils/paths.js'

const rootDir = path.resolve(moduleDirectory(import.meta.url), '..')

await main(rootDir, createDefaultDeps())
