/**
 * Log message prefixes for the FHIR dataset importer
 * These constants keep log lines consistent across every stage of an import run
 */

export const LogPrefixes = {
  // Catalog discovery
  DISCOVERY: '[DISCOVERY]',

  // Import planning
  PLAN: '[PLAN]',

  // Manifest building and $import kickoff
  SUBMIT: '[SUBMIT]',

  // Job status polling
  POLL: '[POLL]',

  // Retry/recovery decisions
  RETRY: '[RETRY]',

  // Skipped datasets or objects
  SKIP: '[SKIP]',

  // Dry run operations
  DRY_RUN: '[DRY RUN]',

  // Terminal outcomes
  SUCCESS: '[SUCCESS]',
  FAILURE: '[FAILURE]',

  // Cancellation
  CANCEL: '[CANCEL]',

  // Summary operations
  SUMMARY: '[SUMMARY]'
} as const;

export type LogPrefix = typeof LogPrefixes[keyof typeof LogPrefixes];
