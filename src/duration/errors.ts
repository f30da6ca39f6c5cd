/**
 * Duration Module - Error Types
 *
 * Typed error union for duration parsing.
 */

export type DurationError =
  | {
      readonly type: "INVALID_FORMAT";
      readonly input: string;
      readonly message: string;
    }
  | {
      readonly type: "UNSUPPORTED_TYPE";
      readonly received: string;
      readonly message: string;
    };

export const invalidFormat = (input: string): DurationError => ({
  type: "INVALID_FORMAT",
  input,
  message: `Invalid duration: "${input}"`,
});

export const unsupportedType = (received: string): DurationError => ({
  type: "UNSUPPORTED_TYPE",
  received,
  message: `Unsupported duration type: ${received}`,
});
