import { collectOnly } from "@/cli/helpers";
import { deleteCommand } from "@/cli/delete";
import { runCommand } from "@/cli/run";
import { Command } from "commander";
import { consola } from "consola";

const program = new Command();
program
  .name("manageiq-reconcile")
  .description("reconcile ManageIQ providers and custom attributes")
  .showHelpAfterError();

program
  .command("run")
  .description("add, update or delete each configured item according to its state")
  .option("-c, --config <path>", "config file path")
  .option("--only <names>", "comma-separated provider or entity names", collectOnly, [])
  .option("--dry-run", "compute and print changes only")
  .option("--json", "print JSON output")
  .option("-v, --verbose", "log requests and validation attempts")
  .action(runCommand);

program
  .command("delete")
  .description("delete every configured provider and listed custom attribute")
  .option("-c, --config <path>", "config file path")
  .option("--only <names>", "comma-separated provider or entity names", collectOnly, [])
  .option("--dry-run", "report what would be deleted")
  .option("--json", "print JSON output")
  .option("-v, --verbose", "log requests")
  .action(deleteCommand);

program.parseAsync(process.argv).catch((error: unknown) => {
  consola.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
