import { readFileSync } from "fs";
import { formatGridSummary, loadGrid } from "@vertex-grid/ingestion";

function printGridSummary(path: string | undefined) {
  if (!path) throw new Error("usage: print-grid-summary <topology-or-geojson-file>");
  const data: unknown = JSON.parse(readFileSync(path, "utf-8"));
  const { grid, skipped } = loadGrid(data);

  console.log(`Grid summary for ${path}\n`);
  for (const line of formatGridSummary(grid, skipped)) {
    console.log(line);
  }
}

try {
  printGridSummary(process.argv[2]);
} catch (err) {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exitCode = 1;
}
