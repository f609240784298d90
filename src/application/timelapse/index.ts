export * from './commands/create-timelapse.command.js';
export * from './dto/create-timelapse.dto.js';
export * from './handlers/create-timelapse.handler.js';
export * from './services/encode-orchestrator.js';
