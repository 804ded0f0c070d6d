export {
  initTracing,
  shutdownTracing,
  getTracer,
  getCurrentTraceContext,
  startSpan,
  recordSpanEvent,
  type TraceContext,
} from './tracing';

export {
  recordHttpRequest,
  recordTransform,
  recordCacheOperation,
  recordAdmission,
  recordJobTransition,
  setQueueDepth,
  getMetrics,
  getContentType,
  register,
} from './metrics';
