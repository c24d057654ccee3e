import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { ProbeUploadModule } from "../../probe-upload/probe-upload.module";

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ".env",
    }),
    ProbeUploadModule,
  ],
})
export class AppModule {}
