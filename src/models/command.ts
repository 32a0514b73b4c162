/**
 * Command descriptor model.
 *
 * A descriptor is plain data describing one protocol operation: the token
 * sent to the device, the argument it accepts and how to read the reply.
 */

/**
 * Semantic type of the single argument a command accepts.
 */
export type ArgumentType = 'integer' | 'real';

/**
 * Target type a reply line is cast to.
 */
export type ReplyType = 'string' | 'integer' | 'real';

/**
 * Inclusive numeric bounds applied to an argument before encoding.
 */
export interface Bounds {
  readonly min: number;
  readonly max: number;
}

/**
 * Substring `[start, end)` of the reply line. `end` omitted means
 * "to the end of the line".
 */
export interface SliceRule {
  readonly start: number;
  readonly end?: number;
}

/**
 * How to interpret the reply line of a command.
 */
export interface ReplySpec<T extends ReplyType = ReplyType> {
  readonly type: T;
  readonly slice?: SliceRule;
}

export interface CommandDescriptor {
  /** Literal token sent to the device (e.g. "OUT_SP_1") */
  readonly name: string;

  /** Type of the call-site argument. Commands without one take no argument */
  readonly argumentType?: ArgumentType;

  /** Inclusive bounds checked before the argument is sent */
  readonly bounds?: Bounds;

  /** Reply rule. Commands without one discard the reply body */
  readonly reply?: ReplySpec;
}

/**
 * Descriptor whose reply is decoded to a value of type `T`.
 */
export interface QueryDescriptor<T extends ReplyType = ReplyType>
  extends CommandDescriptor {
  readonly reply: ReplySpec<T>;
}

/**
 * Maps a reply type to the TypeScript type it decodes to.
 */
export interface ReplyValueMap {
  string: string;
  integer: number;
  real: number;
}

/**
 * Framing strings of a line-oriented ASCII protocol.
 */
export interface Framing {
  /** Appended to every outbound frame */
  readonly commandTerminator: string;

  /** Ends every reply line */
  readonly replyTerminator: string;

  /** Separates the command name from its argument */
  readonly argumentDelimiter: string;
}
