/**
 * `result_code` value that marks a successful API envelope
 */
export const RESULT_CODE_SUCCESS = 1;

/**
 * `result_code` reported when an error body carries none
 */
export const RESULT_CODE_UNKNOWN = -1;

/**
 * Capability tokens a band can grant to the current member
 */
export const Permissions = {
  POSTING: 'posting',
  COMMENTING: 'commenting',
  CONTENTS_DELETION: 'contents_deletion',
} as const;

export type Permission = (typeof Permissions)[keyof typeof Permissions];

/**
 * Every capability the client asks the permissions endpoint about
 */
export const ALL_PERMISSIONS: readonly Permission[] = [
  Permissions.POSTING,
  Permissions.COMMENTING,
  Permissions.CONTENTS_DELETION,
];

/**
 * Member role reported for the band leader
 */
export const LEADER_ROLE = 'leader';
