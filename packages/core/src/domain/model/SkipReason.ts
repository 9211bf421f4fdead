/** Why the scanner dropped an archive entry. Listed in the order the predicates are evaluated. */
export const SkipReason = {
  NAMESPACE: 'namespace',
  DELETED: 'deleted',
  REDIRECT: 'redirect',
  EXCLUDED_TITLE: 'excluded-title',
} as const;

export type SkipReason = (typeof SkipReason)[keyof typeof SkipReason];

/** Fresh zeroed counter per skip reason. */
export function emptySkipCounts(): Record<SkipReason, number> {
  return {
    [SkipReason.NAMESPACE]: 0,
    [SkipReason.DELETED]: 0,
    [SkipReason.REDIRECT]: 0,
    [SkipReason.EXCLUDED_TITLE]: 0,
  };
}
