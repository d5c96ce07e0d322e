import { mkdtemp, mkdir, rm, writeFile } from "fs/promises";
import path from "path";
import { tmpdir } from "os";

// Eight lines whose normalized form joins to well over the default 120 chars.
export const SHARED_BLOCK = [
  "const alphaValue = computeFirst(inputOne);",
  "const betaValue = computeSecond(inputTwo);",
  "const gammaValue = computeThird(inputThree);",
  "const deltaValue = computeFourth(inputFour);",
  "const epsilonValue = computeFifth(inputFive);",
  "const zetaValue = computeSixth(inputSix);",
  "const etaValue = computeSeventh(inputSeven);",
  "const thetaValue = computeEighth(inputEight);",
];

export function lines(...parts: string[][]): string {
  return parts.flat().join("\n") + "\n";
}

export async function makeTree(files: Record<string, string>): Promise<string> {
  const root = await mkdtemp(path.join(tmpdir(), "twinblocks-"));
  for (const [relPath, content] of Object.entries(files)) {
    const absPath = path.join(root, relPath);
    await mkdir(path.dirname(absPath), { recursive: true });
    await writeFile(absPath, content, "utf8");
  }
  return root;
}

export async function removeTree(root: string | null): Promise<void> {
  if (root) await rm(root, { recursive: true, force: true });
}
