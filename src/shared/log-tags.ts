/**
 * Message prefixes for the structured log stream. Downstream sinks filter on
 * these; every tagged record also carries masterPositionId and instrumentId
 * where one applies.
 */
export const LogTag = {
	Open: "[OPEN]",
	Adjust: "[ADJUST]",
	Close: "[CLOSE]",
	Volume: "[VOLUME]",
	Error: "[ERROR]",
	Reconcile: "[RECONCILE]",
	Session: "[SESSION]",
} as const;

export type LogTag = (typeof LogTag)[keyof typeof LogTag];
