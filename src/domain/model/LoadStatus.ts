export const LoadStatus = {
  CREATED: 'CREATED',
  PREVIEWING: 'PREVIEWING',
  PREVIEWED: 'PREVIEWED',
  RESOLVING: 'RESOLVING',
  LOADING: 'LOADING',
  COMPLETED: 'COMPLETED',
  ABORTED: 'ABORTED',
  FAILED: 'FAILED',
} as const;

export type LoadStatus = (typeof LoadStatus)[keyof typeof LoadStatus];

const VALID_TRANSITIONS: Record<LoadStatus, readonly LoadStatus[]> = {
  [LoadStatus.CREATED]: [LoadStatus.PREVIEWING, LoadStatus.RESOLVING],
  [LoadStatus.PREVIEWING]: [LoadStatus.PREVIEWED, LoadStatus.FAILED],
  [LoadStatus.PREVIEWED]: [LoadStatus.RESOLVING],
  [LoadStatus.RESOLVING]: [LoadStatus.LOADING, LoadStatus.ABORTED, LoadStatus.FAILED],
  [LoadStatus.LOADING]: [LoadStatus.COMPLETED, LoadStatus.ABORTED, LoadStatus.FAILED],
  [LoadStatus.COMPLETED]: [],
  [LoadStatus.ABORTED]: [],
  [LoadStatus.FAILED]: [],
};

export function canTransition(from: LoadStatus, to: LoadStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function isTerminal(status: LoadStatus): boolean {
  return VALID_TRANSITIONS[status].length === 0;
}
