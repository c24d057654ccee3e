import { AudioType, ContainerType } from "./audio-type";

/**
 * A positive classification
 */
export interface Detection {
  format: AudioType;
  container: ContainerType;
}

/**
 * One format check in the detection chain
 */
export interface IFormatDetector {
  /**
   * Unique registry key
   */
  readonly name: string;

  /**
   * Classifies the buffer
   * @returns The classification, or null when the buffer is not this format
   */
  detect(data: Uint8Array): Detection | null;
}

/**
 * Interface for the detector registry
 * Holds detectors in the order they are tried
 */
export interface IDetectorRegistry {
  /**
   * Appends a detector to the chain
   * @param detector - The detector; its name must not be registered yet
   */
  registerDetector(detector: IFormatDetector): void;

  /**
   * Gets a detector by name
   * @returns The detector, or null if none is registered under that name
   */
  getDetector(name: string): IFormatDetector | null;

  /**
   * All detectors in registration order
   */
  getDetectors(): readonly IFormatDetector[];
}
