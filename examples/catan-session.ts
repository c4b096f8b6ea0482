import type { Roll } from "../src/index";
import {
  analyzeSession,
  CATAN_DICE,
  expectedDistribution,
  lowMidHigh,
  parseDieSet,
  RollLogQuery,
} from "../src/index";

// A short made-up game: three players, the last one suspiciously fond of 7.
function sampleLog(): Roll[] {
  const sums: Record<string, number[]> = {
    ann: [6, 8, 5, 9, 7, 4, 10, 6, 8, 3, 11, 7, 6, 9, 2, 8],
    bob: [7, 5, 9, 8, 6, 12, 4, 7, 10, 6, 8, 5, 9, 3, 7, 6],
    cat: [7, 7, 8, 7, 6, 7, 7, 9, 7, 7, 5, 7, 7, 8, 7, 7],
  };
  const rolls: Roll[] = [];
  for (let turn = 0; turn < 16; turn++) {
    for (const playerId of Object.keys(sums)) {
      rolls.push({
        playerId,
        gameId: "demo",
        sum: sums[playerId][turn],
        timestamp: new Date(Date.UTC(2024, 5, 1, 19, 0, rolls.length * 40)),
      });
    }
  }
  return rolls;
}

function printChart(query: RollLogQuery) {
  console.log("Total  Observed  Expected");
  for (const point of query.distribution(CATAN_DICE)) {
    const bar = "#".repeat(point.observed);
    console.log(
      `${String(point.x).padStart(5)}  ${String(point.observed).padStart(8)}  ${point.expected
        .toFixed(1)
        .padStart(8)}  ${bar}`
    );
  }
}

function main() {
  const log = sampleLog();
  const report = analyzeSession(
    {
      gameId: "demo",
      dieSet: parseDieSet("2d6"),
      players: [
        { id: "ann", name: "Ann" },
        { id: "bob", name: "Bob" },
        { id: "cat", name: "Cat" },
      ],
    },
    log,
    { binning: lowMidHigh(expectedDistribution(CATAN_DICE).support()) }
  );

  printChart(new RollLogQuery(log));

  const fit = report.fairness;
  console.log(
    `\nGoodness of fit (${fit.status}): chi2=${fit.chiSquare.toFixed(2)} df=${fit.degreesOfFreedom} p=${fit.pValue.toFixed(4)} [${fit.method}]`
  );
  for (const { name, report: r } of report.perPlayer) {
    console.log(
      `  ${name.padEnd(4)} n=${r.totalRolls} ${r.status === "ok" ? `chi2=${r.chiSquare.toFixed(2)} p=${r.pValue.toFixed(4)}` : r.status}`
    );
  }

  const ind = report.independence;
  console.log(
    `\nPlayers vs outcomes (${ind.status}): chi2=${ind.chiSquare.toFixed(2)} df=${ind.degreesOfFreedom} p=${ind.pValue.toFixed(4)} V=${ind.cramersV?.toFixed(3) ?? "n/a"}`
  );
}

main();
