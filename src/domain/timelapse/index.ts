export * from './contracts/frame-normalizer.js';
export * from './contracts/image-source.js';
export * from './contracts/timelapse-encoder.js';
export * from './contracts/video-writer.js';
export * from './entities/timelapse-job.js';
export * from './value-objects/dimensions.js';
export * from './value-objects/source-image.js';
