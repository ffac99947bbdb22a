import { generateFixtureTree, mulberry32 } from "../src/infrastructure/fixtures/FixtureTree.js";
import { loadFixtureTreeConfig } from "../src/infrastructure/fixtures/fixtureTreeConfig.js";

async function main(): Promise<void> {
  const config = loadFixtureTreeConfig(process.argv.slice(2), process.env);
  const summary = await generateFixtureTree({
    depth: config.depth,
    maxAgeSeconds: config.maxAgeDays * 24 * 60 * 60,
    nowSeconds: Math.floor(Date.now() / 1000),
    random: mulberry32(config.seed),
    root: config.root,
    users: config.users,
  });

  process.stdout.write(
    [
      "Purge fixture tree generated",
      `root=${config.root}`,
      `users=${summary.userDirectories.length}`,
      `directories=${summary.directories}`,
      `files=${summary.files}`,
      `seed=${config.seed}`,
      "",
    ].join("\n"),
  );
}

main().catch((error) => {
  process.stderr.write(
    `ERROR: ${error instanceof Error ? error.stack || error.message : String(error)}\n`,
  );
  process.exit(1);
});
