import { Injectable } from "@nestjs/common";
import { AudioType, ContainerType } from "./audio-type";
import { DetectorRegistryService } from "./detector-registry.service";
import { Detection } from "./detector.interface";

export const UNKNOWN_DETECTION: Detection = Object.freeze({
  format: AudioType.Unknown,
  container: ContainerType.None,
});

/**
 * Runs the registered detectors in order and keeps the first positive answer
 */
@Injectable()
export class FormatDetectorService {
  constructor(private readonly registry: DetectorRegistryService) {}

  detect(data: Uint8Array): Detection {
    for (const detector of this.registry.getDetectors()) {
      const detection = detector.detect(data);
      if (detection !== null) {
        return detection;
      }
    }
    return UNKNOWN_DETECTION;
  }
}
