import { CollatexEngine } from "../lib/collatex-engine.js";
import { loadCollatexConfig, loadNormalizationProfile } from "../lib/config.js";
import { formatError, runCollate } from "../lib/commands.js";

async function main() {
  const engine = new CollatexEngine(loadCollatexConfig());
  await runCollate(process.argv.slice(2), { profile: loadNormalizationProfile(), log: console.log }, engine);
}

main().catch((error) => {
  console.error(formatError(error));
  process.exit(1);
});
