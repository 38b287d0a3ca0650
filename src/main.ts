import * as dotenv from "dotenv";
dotenv.config();

import "reflect-metadata";
import helmet from "helmet";
import { NestFactory } from "@nestjs/core";
import type { INestApplication, LogLevel } from "@nestjs/common";
import { ValidationPipe } from "@nestjs/common";
import { DocumentBuilder, SwaggerDocumentOptions, SwaggerModule } from "@nestjs/swagger";
import { FilteredLogger } from "@/common/logging/filtered-logger";
import { HttpExceptionFilter } from "@/common/filters/http-exception.filter";
import { toError } from "@/common/utils/error.utils";
import { AppModule } from "@/app.module";
import { ENV, ENV_HELPERS } from "@/config/environment.constants";

// Global application instance for graceful shutdown
let app: INestApplication | null = null;
const logger = new FilteredLogger("Bootstrap");

async function bootstrap(): Promise<void> {
  try {
    const appCreationStart = performance.now();
    app = await NestFactory.create(AppModule, {
      logger: getLogLevels(),
      abortOnError: false,
    });
    logger.log(`NestJS application created in ${(performance.now() - appCreationStart).toFixed(2)}ms`);

    app.enableCors({
      origin: ENV.APPLICATION.CORS_ORIGIN || true,
      methods: ["GET", "POST", "DELETE", "OPTIONS"],
      allowedHeaders: ["Content-Type", "Authorization", "X-Requested-With", "X-Request-Id"],
      credentials: false,
    });

    app.use(
      helmet({
        contentSecurityPolicy: {
          directives: {
            defaultSrc: ["'self'"],
            styleSrc: ["'self'", "'unsafe-inline'"],
            scriptSrc: ["'self'"],
            imgSrc: ["'self'", "data:", "https:"],
          },
        },
        crossOriginEmbedderPolicy: false,
      })
    );

    app.useGlobalPipes(
      new ValidationPipe({
        whitelist: true,
        forbidNonWhitelisted: true,
        transform: true,
        disableErrorMessages: ENV_HELPERS.isProduction(),
      })
    );
    app.useGlobalFilters(new HttpExceptionFilter());

    const basePath = ENV.APPLICATION.BASE_PATH;
    if (basePath) {
      app.setGlobalPrefix(basePath);
    }
    setupSwaggerDocumentation(app, basePath);

    setupGracefulShutdown();

    const port = ENV.APPLICATION.PORT;
    await app.listen(port, "0.0.0.0");
    logger.log(`HTTP server listening on port ${port}${basePath}`);
  } catch (error) {
    const err = toError(error);
    if (err.message.includes("EADDRINUSE")) {
      logger.error(`Port ${ENV.APPLICATION.PORT} is already in use; set APP_PORT to another port`);
    }
    logger.error("Application startup failed:", err.stack);

    if (app) {
      try {
        await app.close();
      } catch (closeError) {
        logger.error("Application cleanup failed:", toError(closeError).stack);
      }
    }
    process.exit(1);
  }
}

function getLogLevels(): LogLevel[] {
  switch (ENV.LOGGING.LOG_LEVEL) {
    case "fatal":
      return ["fatal"];
    case "error":
      return ["fatal", "error"];
    case "warn":
      return ["fatal", "error", "warn"];
    case "log":
      return ["fatal", "error", "warn", "log"];
    case "debug":
      return ["fatal", "error", "warn", "log", "debug"];
    case "verbose":
      return ["fatal", "error", "warn", "log", "debug", "verbose"];
  }
}

function setupSwaggerDocumentation(app: INestApplication, basePath: string): void {
  const config = new DocumentBuilder()
    .setTitle("Data Collection Pipeline API")
    .setDescription(
      "Collects records from configured sources with retry and per-source rate limiting, " +
        "scores their quality and returns the accept/reject decision."
    )
    .setVersion("1.0.0")
    .addTag("Collection", "Submit, cancel and inspect collection requests")
    .addTag("System Health", "Source health, pipeline totals and rate limiter state")
    .build();

  const options: SwaggerDocumentOptions = {
    operationIdFactory: (_controllerKey: string, methodKey: string) => methodKey,
  };

  const document = SwaggerModule.createDocument(app, config, options);
  SwaggerModule.setup(`${basePath}/api-docs`, app, document);
  logger.log("API documentation configured");
}

function setupGracefulShutdown(): void {
  let isShuttingDown = false;

  const shutdown = async (reason: string, exitCode: number): Promise<void> => {
    if (isShuttingDown) {
      logger.log(`${reason} during shutdown, ignoring...`);
      return;
    }
    isShuttingDown = true;
    logger.log(`${reason}, starting graceful shutdown...`);

    try {
      await gracefulShutdown();
    } catch (error) {
      logger.error("Error during shutdown:", toError(error).stack);
      exitCode = 1;
    }
    process.exit(exitCode);
  };

  for (const signal of ["SIGTERM", "SIGINT"] as const) {
    process.on(signal, () => {
      void shutdown(`Received ${signal}`, 0);
    });
  }

  process.on("uncaughtException", error => {
    logger.error("Uncaught Exception:", error.stack);
    void shutdown("Uncaught exception", 1);
  });

  process.on("unhandledRejection", reason => {
    logger.error(`Unhandled Rejection: ${toError(reason).message}`);
    void shutdown("Unhandled rejection", 1);
  });
}

async function gracefulShutdown(): Promise<void> {
  if (!app) {
    return;
  }

  const timeoutMs = ENV.APPLICATION.GRACEFUL_SHUTDOWN_MS;
  const shutdownTimeout = setTimeout(() => {
    logger.error(`Shutdown timeout reached after ${timeoutMs}ms, forcing exit`);
    process.exit(1);
  }, timeoutMs);

  const shutdownStartTime = Date.now();
  // Triggers OnModuleDestroy: in-flight requests are cancelled and adapters closed
  await app.close();
  app = null;
  clearTimeout(shutdownTimeout);

  logger.log(`Graceful shutdown completed in ${Date.now() - shutdownStartTime}ms`);
}

// Start the application
void bootstrap();
