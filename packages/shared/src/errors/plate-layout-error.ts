export const PLATE_LAYOUT_ERROR_CODES = [
  'INVALID_PLATE_SIZE',
  'INVALID_POSITION_FORMAT',
  'UNRECOGNIZED_POSITION_FORMAT',
  'MISSING_COLUMN',
  'POSITION_COLUMN_NOT_FOUND',
  'VALUE_COLUMN_NOT_FOUND',
  'POSITION_OUT_OF_BOUNDS',
  'UNKNOWN_ROW_LABEL',
  'INVALID_START_POSITION',
  'DUPLICATE_POSITION',
] as const;
export type PlateLayoutErrorCode = (typeof PLATE_LAYOUT_ERROR_CODES)[number];

/** Where in the pipeline the failure happened */
export const PLATE_LAYOUT_STAGES = [
  'geometry',
  'detection',
  'conversion',
  'position-column',
  'value-column',
  'plate-column',
  'plate-map',
] as const;
export type PlateLayoutStage = (typeof PLATE_LAYOUT_STAGES)[number];

export type PlateLayoutErrorDetails = Record<string, unknown>;

/**
 * Failure raised by the layout engine. `details` lists the inputs that were
 * examined (candidate names, available columns, offending value, row index)
 * so a caller can see which hint to supply.
 */
export class PlateLayoutError extends Error {
  readonly code: PlateLayoutErrorCode;
  readonly stage: PlateLayoutStage;
  readonly details: PlateLayoutErrorDetails;

  constructor(
    code: PlateLayoutErrorCode,
    stage: PlateLayoutStage,
    message: string,
    details: PlateLayoutErrorDetails = {},
  ) {
    super(message);
    this.name = 'PlateLayoutError';
    this.code = code;
    this.stage = stage;
    this.details = details;
  }

  /** Same error, re-attributed to another stage with extra context */
  withStage(stage: PlateLayoutStage, details: PlateLayoutErrorDetails = {}): PlateLayoutError {
    return new PlateLayoutError(this.code, stage, this.message, { ...this.details, ...details });
  }

  toJSON(): { code: PlateLayoutErrorCode; stage: PlateLayoutStage; message: string; details: PlateLayoutErrorDetails } {
    return { code: this.code, stage: this.stage, message: this.message, details: this.details };
  }
}

export function isPlateLayoutError(error: unknown): error is PlateLayoutError {
  return error instanceof PlateLayoutError;
}
