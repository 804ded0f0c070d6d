export {
  FingerprintService,
  fingerprintService,
  normalizeNumber,
  normalizeDegrees,
  normalizeColor,
  stableStringify,
} from './fingerprint.service';
