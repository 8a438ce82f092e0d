/**
 * Test setup file for vitest
 *
 * Keeps every test away from the real data directory and log files
 */

import { mkdtempSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

process.env.MATRIXMAIL_HOME_DIR = mkdtempSync(join(tmpdir(), 'matrixmail-test-home-'))
delete process.env.DEBUG
