import "reflect-metadata";
import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { HttpExceptionFilter } from "./common/filters/http-exception.filter";
import { AppModule } from "./tasks/probe/app.module";

const DEFAULT_PORT = 3000;

function resolvePort(raw: string | undefined): number {
  const port = Number(raw);
  return Number.isInteger(port) && port > 0 ? port : DEFAULT_PORT;
}

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule);
  app.useGlobalFilters(new HttpExceptionFilter());

  const port = resolvePort(process.env.PORT);
  await app.listen(port);
  Logger.log(`Media probe listening on port ${port}`, "Bootstrap");
}

bootstrap().catch((error: unknown) => {
  Logger.error("Failed to start", error instanceof Error ? error.stack : String(error), "Bootstrap");
  process.exit(1);
});
