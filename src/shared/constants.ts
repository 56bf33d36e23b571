export const LIFECYCLE_TRACKER_VERSION = '0.1.0';
export const API_PREFIX = '/api';

export const WORK_ITEM_KINDS = ['ISSUE', 'PULL_REQUEST'] as const;

export const WORK_ITEM_STATES = [
  'BACKLOG',
  'READY',
  'IN_PROGRESS',
  'READY_FOR_REVIEW',
  'PASSED_REVIEW',
  'BLOCKED',
  'DONE',
] as const;

export const INITIAL_STATES = ['BACKLOG', 'READY'] as const;

export const TERMINAL_STATES = ['DONE'] as const;

export const ERROR_CODES = [
  'INVALID_INITIAL_STATE',
  'INVALID_KIND',
  'ILLEGAL_TRANSITION',
  'NOT_BLOCKED',
  'UNKNOWN_ITEM',
  'DUPLICATE_ITEM',
] as const;
