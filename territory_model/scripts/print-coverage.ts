import { computeTerritoryCoverage } from "../src/coverage.js";
import { getTerritoryKnowledgeBase } from "../src/index.js";

function formatPercent(numerator: number, denominator: number): string {
  if (denominator === 0) return "0%";
  return ((numerator / denominator) * 100).toFixed(1) + "%";
}

function printCoverage() {
  const coverage = computeTerritoryCoverage(getTerritoryKnowledgeBase());

  console.log("Territory dataset coverage summary\n");
  console.log(`Valid territory codes: ${coverage.totalTerritories}`);
  console.log(
    `Codes with attribute records: ${coverage.territoriesWithAttributes} (${formatPercent(
      coverage.territoriesWithAttributes,
      coverage.totalTerritories
    )})`
  );
  console.log(`Containment parents: ${coverage.containmentParents}`);
  console.log(`Contained codes: ${coverage.containedTerritories}`);
  if (coverage.validOutsideContainment.length > 0) {
    console.log(`Valid codes outside containment: ${coverage.validOutsideContainment.join(", ")}`);
  }

  console.log("\nLocale coverage:");
  for (const locale of coverage.locales) {
    const named = coverage.totalTerritories - locale.validWithoutName.length;
    console.log(
      `- ${locale.locale}: ${locale.namedTerritories} names, ${named}/${coverage.totalTerritories} valid codes named (${formatPercent(
        named,
        coverage.totalTerritories
      )})`
    );
    if (locale.validWithoutName.length > 0) {
      console.log(`  missing valid codes: ${locale.validWithoutName.join(", ")}`);
    }
    if (locale.containmentWithoutName.length > 0) {
      console.log(`  missing containment codes: ${locale.containmentWithoutName.join(", ")}`);
    }
  }
}

printCoverage();
