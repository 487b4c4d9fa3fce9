import "reflect-metadata";
import { NestFactory } from "@nestjs/core";
import { parseRuntimeOptionsFromArgv } from "@strata/config";
import { AppModule } from "./app.module";
import { exitCodeFor, EXIT_SUCCESS, renderError } from "./cli/cli-errors";
import { CliRunnerService } from "./cli/cli-runner.service";

async function bootstrap(argv: string[]): Promise<number> {
  const runtimeOptions = parseRuntimeOptionsFromArgv(argv);
  const app = await NestFactory.createApplicationContext(
    AppModule.forRoot(runtimeOptions),
    { logger: false },
  );

  try {
    await app.get(CliRunnerService).run(argv);
    return EXIT_SUCCESS;
  } catch (error) {
    for (const line of renderError(error)) {
      console.error(line);
    }
    return exitCodeFor(error);
  } finally {
    await app.close();
  }
}

bootstrap(process.argv.slice(2)).then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    for (const line of renderError(error)) {
      console.error(line);
    }
    process.exitCode = exitCodeFor(error);
  },
);
