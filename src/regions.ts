import { createInterface } from "node:readline/promises";
import { stdin, stdout } from "node:process";
import type { Readable, Writable } from "node:stream";

const REGION_PATTERN = /^[a-z]{2}(-[a-z]+)+-\d+$/;

/**
 * Resolves one answer to the region prompt: a 1-based index into `regions`,
 * or a region name from the list. When the list could not be loaded any
 * well-formed region name is accepted.
 */
export function selectRegion(answer: string, regions: string[]) {
  const choice = answer.trim();
  if (!choice) return undefined;
  if (/^\d+$/.test(choice)) {
    const index = Number(choice) - 1;
    return index >= 0 && index < regions.length ? regions[index] : undefined;
  }
  if (regions.length === 0) {
    return REGION_PATTERN.test(choice) ? choice : undefined;
  }
  return regions.includes(choice) ? choice : undefined;
}

export function assertKnownRegion(region: string, regions: string[]) {
  if (regions.length > 0 && !regions.includes(region)) {
    throw new Error(`Region not available for this account: ${region}`);
  }
  if (regions.length === 0 && !REGION_PATTERN.test(region)) {
    throw new Error(`Invalid region name: ${region}`);
  }
}

export function formatRegionMenu(regions: string[]) {
  return ["Available regions:", ...regions.map((region, index) => `${index + 1}. ${region}`)].join(
    "\n"
  );
}

export async function promptRegion(
  regions: string[],
  io: { input: Readable; output: Writable } = { input: stdin, output: stdout }
) {
  const rl = createInterface({ input: io.input, output: io.output });
  try {
    if (regions.length > 0) {
      io.output.write(`${formatRegionMenu(regions)}\n`);
    }
    for (;;) {
      const answer = await rl.question("Region number or name: ");
      const region = selectRegion(answer, regions);
      if (region) return region;
      io.output.write("Invalid choice. Select a listed region.\n");
    }
  } finally {
    rl.close();
  }
}
