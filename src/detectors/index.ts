// ============================================================================
// Detectors Module: Barrel Export
// ============================================================================

export {
  ALL_DETECTORS,
  DETECTOR_CODES,
  DETECTORS,
  detectorFromIndex,
  detectorFromName,
  detectorName,
  isDetectorCode,
  normalizeDetector,
} from './detectors.js';
export type { Detector, DetectorCode, DetectorInput } from './detectors.js';
