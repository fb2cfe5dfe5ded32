import { Command } from "commander";
import { getRegistry } from "../lib/core/context";
import { formatRegistry } from "../lib/output/formatter";

export const formats = new Command("formats")
  .description("List the supported conversions")
  .action(() => {
    console.log(formatRegistry(getRegistry().entries(), { plain: !process.stdout.isTTY }));
  });
