import fs from "node:fs/promises";
import path from "node:path";

export async function writeJsonFile(
  outPath: string,
  data: unknown
): Promise<void> {
  await fs.mkdir(path.dirname(outPath), { recursive: true });
  await fs.writeFile(outPath, `${JSON.stringify(data, null, 2)}\n`);
}
