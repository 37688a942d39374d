import { parse, stringify } from "csv/sync";
import { readFile, writeFile } from "fs/promises";
import type { OutputArtifacts } from "./run-workspace";

/**
 * A variant as a simple positional record. The length delta is
 * len(ALT) - len(REF) so is zero for substitutions, positive for
 * insertions and negative for deletions.
 */
export type BedRow = {
  chrom: string;
  start: number;
  end: number;
  lengthDelta: number;
};

export type BedSplit = {
  snps: BedRow[];
  indels: BedRow[];
};

function isStringRow(row: unknown): row is string[] {
  return Array.isArray(row) && row.every((v) => typeof v === "string");
}

/**
 * Convert the data lines of a VCF into BED like rows.
 *
 * NOTE the ALT length is that of the column as written - so for multi-allelic
 * sites ("A,T") the delta counts the commas too.
 *
 * @param vcfText the entire (uncompressed) VCF content including its header
 */
export function vcfToBedRows(vcfText: string): BedRow[] {
  const dataLines = vcfText
    .split("\n")
    .filter((l) => !l.startsWith("#"))
    .join("\n");

  const records: unknown = parse(dataLines, {
    delimiter: "\t",
    quote: false,
    relax_column_count: true,
    skip_empty_lines: true,
  });

  if (!Array.isArray(records))
    throw new Error("Parsing VCF did not produce a list of records");

  return records.map((record: unknown, i: number) => {
    if (!isStringRow(record) || record.length < 5)
      throw new Error(
        `VCF data line ${i + 1} does not have the CHROM POS ID REF ALT columns we need`
      );

    const [chrom, rawPos, , ref, alt] = record;
    const start = Number(rawPos);

    if (!Number.isInteger(start))
      throw new Error(`VCF data line ${i + 1} has a non integer POS '${rawPos}'`);

    const lengthDelta = alt.length - ref.length;

    return {
      chrom: chrom.startsWith("chr") ? chrom.slice(3) : chrom,
      start,
      end: start + lengthDelta,
      lengthDelta,
    };
  });
}

export function formatBedRows(rows: BedRow[]): string {
  return stringify(
    rows.map((r) => [r.chrom, r.start, r.end, r.lengthDelta]),
    { delimiter: "\t" }
  );
}

/**
 * Divide rows into substitutions (no change in length) and everything else.
 */
export function splitBedRows(rows: BedRow[]): BedSplit {
  return {
    snps: rows.filter((r) => r.lengthDelta === 0),
    indels: rows.filter((r) => r.lengthDelta !== 0),
  };
}

/**
 * Read an uncompressed VCF and write out the full BED table as well as
 * the SNP and indel subsets.
 *
 * @param vcfPath
 * @param outputs where to write the three tables
 */
export async function convertVcfToBed(
  vcfPath: string,
  outputs: Pick<OutputArtifacts, "bed" | "snps" | "indels">
): Promise<BedSplit> {
  const rows = vcfToBedRows(await readFile(vcfPath, "utf8"));
  const split = splitBedRows(rows);

  await writeFile(outputs.bed, formatBedRows(rows));
  await writeFile(outputs.snps, formatBedRows(split.snps));
  await writeFile(outputs.indels, formatBedRows(split.indels));

  console.log(
    `Wrote ${rows.length} variants to ${outputs.bed} (${split.snps.length} snps, ${split.indels.length} indels)`
  );

  return split;
}
