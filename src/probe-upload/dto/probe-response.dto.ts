import { AudioType, ContainerType } from "../../detection/audio-type";
import { ProbeDetails } from "../../detection/probe.types";

/**
 * Body of a successful `POST /probe`
 */
export interface ProbeResponseDto {
  format: AudioType;
  container: ContainerType;
  details?: ProbeDetails;
}
