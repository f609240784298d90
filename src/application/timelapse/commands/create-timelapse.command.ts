import type { CreateTimelapsePayload } from '../dto/create-timelapse.dto.js';

export class CreateTimelapseCommand {
  public readonly payload: CreateTimelapsePayload;

  public constructor(payload: CreateTimelapsePayload) {
    this.payload = payload;
  }
}
