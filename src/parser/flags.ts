/** Bit flags accepted by `JsonDocument.parse`. */
export const ParseFlags = {
  None: 0,
  /** Captured strings and numbers are not NUL-terminated; use the view's end. */
  NoStringTerminators: 1,
  /** Strings are copied into the arena instead of being unescaped inside the input. */
  NoInlineTranslation: 2,
  /** Every string and number is copied into the arena with a terminator. */
  ForceStringTerminators: 4,
  /** Accept a comma before `]` and `}`. */
  TrailingCommas: 8,
  /** Accept line (`//`, `#`) and block comments wherever whitespace may appear. */
  Comments: 16,
  /** Never write into the input buffer. Views may lack terminators. */
  NonDestructive: 1 | 2,
  /** Never write into the input buffer. Every capture is a terminated copy. */
  NonDestructiveTerminated: 4,
} as const;

const KNOWN_FLAGS = 1 | 2 | 4 | 8 | 16;

export type ParseMode = {
  terminators: boolean;
  noInline: boolean;
  force: boolean;
  trailingCommas: boolean;
  comments: boolean;
};

export const resolveParseFlags = (flags: number): ParseMode => {
  if (!Number.isInteger(flags) || (flags & ~KNOWN_FLAGS) !== 0) {
    throw new RangeError(`Unknown parse flags 0x${flags.toString(16)}`);
  }
  const noTerminators = (flags & ParseFlags.NoStringTerminators) !== 0;
  const force = (flags & ParseFlags.ForceStringTerminators) !== 0;
  if (noTerminators && force) {
    throw new RangeError("NoStringTerminators and ForceStringTerminators are mutually exclusive");
  }
  return {
    terminators: !noTerminators,
    noInline: (flags & ParseFlags.NoInlineTranslation) !== 0,
    force,
    trailingCommas: (flags & ParseFlags.TrailingCommas) !== 0,
    comments: (flags & ParseFlags.Comments) !== 0,
  };
};
