export * from './encoder/encoder-process.js';
export * from './encoder/ffmpeg-progress.js';
export * from './encoder/ffmpeg-timelapse-encoder.js';
export * from './image/canvas-frame-normalizer.js';
export * from './image/image-collector.js';
export * from './writer/ffmpeg-wasm-video-writer.js';
export * from './writer/frame-duplication-encoder.js';
