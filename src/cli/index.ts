#!/usr/bin/env node
/**
 * crcforge CLI - combinatorial CRC code generator.
 */

import { parseArgs, getHelpText } from "./args.js";
import { logger } from "./utils/logger.js";

const VERSION = "0.1.0";

async function main() {
  const command = parseArgs();

  switch (command.type) {
    case "help":
      logger.raw(getHelpText());
      break;

    case "version":
      logger.raw(`crcforge v${VERSION}`);
      break;

    case "generate": {
      const { generate } = await import("./commands/generate.js");
      await generate(command.target, command.options);
      break;
    }

    case "convert": {
      const { convert } = await import("./commands/convert.js");
      await convert(command.polynomial, command.options);
      break;
    }

    case "test": {
      const { test } = await import("./commands/test.js");
      await test(command.options);
      break;
    }

    case "presets": {
      const { presets } = await import("./commands/presets.js");
      presets();
      break;
    }

    case "unknown":
      logger.error(`Unknown command: ${command.command}`);
      logger.raw("");
      logger.raw("Run 'crcforge --help' for usage.");
      process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  logger.failure(error);
  process.exit(1);
});
