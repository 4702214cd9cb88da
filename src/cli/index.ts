import { Command } from "commander";
import { APP_VERSION } from "../version";

const program = new Command()
  .name("gamelist")
  .description("Discord bot that suggests games everyone in the party owns")
  .version(APP_VERSION);

program
  .command("init")
  .description("Write a config template and create the identity database")
  .option("-c, --config <path>", "Config file path")
  .option("--reset", "Overwrite an existing config with the template")
  .action(async (options: { config?: string; reset?: boolean }) => {
    const { runInit } = await import("./commands/init");
    await runInit(options);
  });

program
  .command("run")
  .description("Connect to Discord and answer commands")
  .option("-c, --config <path>", "Config file path")
  .action(async (options: { config?: string }) => {
    const { runBot } = await import("./commands/run");
    await runBot(options);
  });

program
  .command("doctor")
  .description("Check the config and read the game list once")
  .option("-c, --config <path>", "Config file path")
  .action(async (options: { config?: string }) => {
    const { runDoctor } = await import("./commands/doctor");
    await runDoctor(options);
  });

await program.parseAsync();

export { program };
