/**
 * Vitest setup file.
 * Configures fast-check global defaults for the property tests.
 */
import * as fc from 'fast-check'

const fuzzIterations = process.env['FUZZ_ITERATIONS'] ?? ''
const parsed = fuzzIterations ? parseInt(fuzzIterations, 10) : NaN
const numRuns = isNaN(parsed) ? 100 : parsed // FUZZ_ITERATIONS=500+ for deeper runs

fc.configureGlobal({
  numRuns,
  verbose: (process.env['FUZZ_VERBOSE'] ?? 'false') === 'true',
})
