import { cac } from "cac";

import { createDefaultLoggerFromEnv } from "~shared/Logger";

import { registerBuild } from "./app/Build";
import { registerRename } from "./app/Rename";
import { registerValidate } from "./app/Validate";

const logger = createDefaultLoggerFromEnv();
const cli = cac("photo-librarian");

registerBuild(cli, logger);
registerRename(cli, logger);
registerValidate(cli, logger);

cli.help();
cli.parse(process.argv, { run: false });

if (!cli.matchedCommand) {
  cli.outputHelp();
  process.exit(0);
}

try {
  await cli.runMatchedCommand();
} catch (error) {
  logger.error({ error })`執行命令時發生錯誤`;
  process.exitCode = 1;
} finally {
  await logger[Symbol.asyncDispose]();
}
