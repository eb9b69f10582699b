export {
  PlateLayoutError,
  isPlateLayoutError,
  PLATE_LAYOUT_ERROR_CODES,
  PLATE_LAYOUT_STAGES,
  type PlateLayoutErrorCode,
  type PlateLayoutStage,
  type PlateLayoutErrorDetails,
} from './plate-layout-error';
