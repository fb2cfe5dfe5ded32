#!/usr/bin/env node
import * as fs from "node:fs";
import * as path from "node:path";
import { program } from "commander";
import { batch } from "./commands/batch";
import { config } from "./commands/config";
import { doc } from "./commands/doc";
import { formats } from "./commands/formats";
import { image } from "./commands/image";
import { info } from "./commands/info";

program
  .name("filecraft")
  .description("Convert, compress and resize images and documents locally")
  .version(
    JSON.parse(
      fs.readFileSync(path.join(__dirname, "../package.json"), {
        encoding: "utf-8",
      }),
    ).version,
  );

program.addCommand(image);
program.addCommand(doc);
program.addCommand(batch);
program.addCommand(info);
program.addCommand(formats);
program.addCommand(config);

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
