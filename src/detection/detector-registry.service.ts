import { Injectable } from "@nestjs/common";
import { DetectorAlreadyRegisteredError } from "./detection.errors";
import { IDetectorRegistry, IFormatDetector } from "./detector.interface";

/**
 * Registry service for format detectors
 * Keeps detectors keyed by name and in the order they were registered
 */
@Injectable()
export class DetectorRegistryService implements IDetectorRegistry {
  private readonly detectors = new Map<string, IFormatDetector>();

  /**
   * Appends a detector to the chain
   * @param detector - The detector implementation
   * @throws DetectorAlreadyRegisteredError if a detector with the same name is already registered
   */
  registerDetector(detector: IFormatDetector): void {
    if (this.detectors.has(detector.name)) {
      throw new DetectorAlreadyRegisteredError(
        `Detector already registered for ${detector.name}. Cannot register duplicate detector.`,
      );
    }
    this.detectors.set(detector.name, detector);
  }

  getDetector(name: string): IFormatDetector | null {
    return this.detectors.get(name) ?? null;
  }

  getDetectors(): readonly IFormatDetector[] {
    // Map iteration follows insertion order
    return [...this.detectors.values()];
  }
}
