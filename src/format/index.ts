export {
  probeFormat,
  readElements,
  ELEMENT_SIZES,
  DEFAULT_ELEMENT_TYPES,
  DEFAULT_OFFSETS,
  type ElementType,
  type OffsetScan,
  type ProbeMode,
  type ProbeOptions,
  type ProbeMatch,
  type ProbeMiss,
  type ProbeResult,
} from './probe.js';
