import { Command, Option } from "clipanion";
import { listCognitionDocuments } from "../../cognition/list.js";
import { errorMessage, loadRuntime } from "../context.js";

export class ListCommand extends Command {
  static override paths = [["list"]];

  static override usage = Command.Usage({
    description: "List cognition documents under a directory",
    examples: [
      ["List documents under the current directory", "mindprint list"],
      ["List documents under a workspace", "mindprint list ./agents"],
    ],
  });

  targetDir = Option.String({ name: "path", required: false });

  async execute(): Promise<void> {
    let config;
    try {
      config = loadRuntime().config;
    } catch (err) {
      this.context.stdout.write(`Failed to load config: ${errorMessage(err)}\n`);
      process.exitCode = 1;
      return;
    }

    const docs = await listCognitionDocuments(this.targetDir ?? ".", {
      outputDirName: config.distill.outputDirName,
    });

    if (docs.length === 0) {
      this.context.stdout.write("No cognition documents found.\n");
      return;
    }

    this.context.stdout.write(`Cognition documents (${docs.length}):\n`);
    for (const doc of docs) {
      const version = doc.modelVersion ?? "invalid";
      this.context.stdout.write(
        `  ${doc.path}\n` +
          `    version=${version} bullets=${doc.bullets} lines=${doc.lines} size=${doc.size}B ` +
          `modified=${new Date(doc.modifiedAt).toISOString()}\n`,
      );
    }
  }
}
