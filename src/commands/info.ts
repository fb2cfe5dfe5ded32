import { Command } from "commander";
import { describeFile } from "../lib/info/describe";
import { formatFileInfo } from "../lib/output/formatter";
import { formatJson } from "../lib/output/json-formatter";

export const info = new Command("info")
  .description("Show size, type and details of a file")
  .argument("<file>", "File to inspect")
  .option("--json", "Print as JSON")
  .action(async (file: string, options: { json?: boolean }) => {
    try {
      const details = await describeFile(file);
      if (options.json) {
        console.log(formatJson({ info: details }));
      } else {
        console.log(formatFileInfo(details, { plain: !process.stdout.isTTY }));
      }
    } catch (error) {
      const message =
        (error as NodeJS.ErrnoException).code === "ENOENT"
          ? `File '${file}' not found`
          : error instanceof Error
            ? error.message
            : "Unknown error";
      console.error("Failed to read file info:", message);
      process.exitCode = 1;
    }
  });
