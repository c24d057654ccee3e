import { Module } from "@nestjs/common";
import { MediaProbeModule } from "../detection/media-probe.module";
import { BusboyFactory } from "./busboy-factory.service";
import { ProbeController } from "./probe.controller";
import { ProbeUploadService } from "./probe-upload.service";

@Module({
  imports: [MediaProbeModule],
  controllers: [ProbeController],
  providers: [ProbeUploadService, BusboyFactory],
})
export class ProbeUploadModule {}
