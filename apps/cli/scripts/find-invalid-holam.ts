import { loadNormalizationProfile } from "../lib/config.js";
import { formatError, runFindInvalidHolam } from "../lib/commands.js";

try {
  runFindInvalidHolam(process.argv.slice(2), { profile: loadNormalizationProfile(), log: console.log });
} catch (error) {
  console.error(formatError(error));
  process.exit(1);
}
