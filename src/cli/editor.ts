import { spawn } from "node:child_process";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import type { Attachment } from "../imap/types.js";
import { TernError } from "../errors.js";
import { log } from "../logger.js";

/**
 * Open `text` in $VISUAL, $EDITOR or vi and return the saved result. The
 * temporary directory is removed on every exit path.
 */
export async function editText(
  text: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<string> {
  const editor = env.VISUAL || env.EDITOR || "vi";
  const dir = await mkdtemp(path.join(tmpdir(), "tern-"));
  const file = path.join(dir, "message.eml");

  try {
    await writeFile(file, text, "utf-8");
    log.debug(`editing ${file} with ${editor}`);

    const code = await new Promise<number | null>((resolve, reject) => {
      // The editor command may carry arguments ("code --wait"); the file
      // goes in as a positional parameter so its path is never re-parsed.
      const child = spawn("sh", ["-c", `${editor} "$1"`, "tern", file], {
        stdio: "inherit",
      });
      child.on("error", reject);
      child.on("exit", resolve);
    });

    if (code !== 0) {
      throw new TernError(`Editor "${editor}" exited with code ${code}; message not sent`);
    }
    return await readFile(file, "utf-8");
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

/**
 * Read all of stdin as text.
 */
export async function readStdin(stream: NodeJS.ReadableStream = process.stdin): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf-8") : chunk);
  }
  return Buffer.concat(chunks).toString("utf-8");
}

/**
 * Load files to attach, as application/octet-stream.
 */
export async function readAttachments(files: string[]): Promise<Attachment[]> {
  return Promise.all(
    files.map(async (file) => ({
      filename: path.basename(file),
      contentType: "application/octet-stream",
      content: await readFile(file),
    }))
  );
}
