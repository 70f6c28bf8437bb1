import { loadTimeScaleConfig } from "./frequency-report/config";
import { buildFrequencyReport } from "./frequency-report/report";

function main() {
  const report = loadTimeScaleConfig().andThen((scale) =>
    buildFrequencyReport(scale).map((rows) => ({ scale, rows }))
  );

  if (report.isErr()) {
    console.error("Failed to build frequency report", report.error);
    process.exitCode = 1;
    return;
  }

  const { scale, rows } = report.value;

  console.log(
    `${scale.unitLength} x ${scale.timeUnit} = ${scale.totalDuration()} s`
  );

  console.table(
    rows.map((row) => ({
      per: `${row.unitLength} x ${row.timeUnit}`,
      frequency: row.frequency,
    }))
  );
}

main();
