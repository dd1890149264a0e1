import "reflect-metadata";
import { Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { NestFactory } from "@nestjs/core";
import { AppModule } from "./app.module";
import { ADMIN_TOKEN_HEADER } from "./auth/admin-auth.guard";

export async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  app.useLogger(new Logger());
  app.enableShutdownHooks();
  app.enableCors({
    origin: process.env.ADMIN_ORIGIN || false,
    methods: ["GET", "POST"],
    allowedHeaders: ["Content-Type", ADMIN_TOKEN_HEADER, "x-trace-id"],
  });
  if (!app.get(ConfigService).get<string>("ADMIN_API_TOKEN")) {
    Logger.warn("ADMIN_API_TOKEN is not set; every admin request will be refused");
  }
  const port = Number(process.env.ADMIN_API_PORT ?? 3002);
  await app.listen(port);
  Logger.log(`Admin API listening on port ${port}`);
}

void bootstrap();
