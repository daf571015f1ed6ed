import 'reflect-metadata';

export * from './AsyncHandlingController.js';
export * from './AsyncRequestHandler.js';
export * from './dispatch.js';
export * from './errors.js';
export * from './ExtraDataFactory.js';
export * from './fallback.js';
export * from './HandlerSequence.js';
export * from './HttpAsyncChain.js';
export * from './HttpContext.js';
export * from './HttpDict.js';
export * from './HttpHandler.js';
export * from './HttpRequestHandle.js';
export * from './RequestHandle.js';
export * from './ScheduleResult.js';
export * from './UniqueController.js';
