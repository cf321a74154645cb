import { runCli } from "./cli/program.js";

export { runCli };

export async function main(argv: string[] = process.argv): Promise<void> {
  process.exitCode = await runCli(argv);
}
