/**
 * CLI script for Bitbucket pull requests.
 *
 * Usage:
 *   npx tsx pr.ts --repo my-repo                          # list open PRs
 *   npx tsx pr.ts --repo my-repo --state MERGED           # list merged PRs
 *   npx tsx pr.ts --repo my-repo --show 42                # one PR with participants
 *   npx tsx pr.ts --repo my-repo --comment 42 --message "lgtm"
 *   npx tsx pr.ts --repo my-repo --approve 42
 *   npx tsx pr.ts --repo my-repo --merge 42 --strategy squash [--close-branch]
 */

import { loadConfig } from "./src/config";
import { BitbucketCloud, getBitbucketConfig, PULL_REQUEST_STATES, type PullRequest, type PullRequestState } from "./src/bitbucket";

const args = process.argv.slice(2);

function getArg(flag: string): string | undefined {
  const idx = args.indexOf(flag);
  return idx >= 0 && idx + 1 < args.length ? args[idx + 1] : undefined;
}

function getId(flag: string): number | undefined {
  const value = getArg(flag);
  if (value === undefined) return undefined;
  const id = Number(value);
  if (!Number.isInteger(id)) throw new Error(`${flag} expects a pull request id, got "${value}"`);
  return id;
}

function parseState(value: string): PullRequestState {
  const state = PULL_REQUEST_STATES.find(s => s === value.toUpperCase());
  if (!state) throw new Error(`--state must be one of ${PULL_REQUEST_STATES.join(", ")}`);
  return state;
}

function formatPR(pr: PullRequest): string {
  const updated = pr.updatedOn?.toISOString().slice(0, 16).replace("T", " ") ?? "?";
  return `#${pr.id} [${pr.state}] ${pr.title} (${pr.sourceBranch} -> ${pr.destinationBranch}) by ${pr.author.displayName ?? "Unknown"}, updated ${updated}`;
}

async function main() {
  const repoSlug = getArg("--repo");
  if (!repoSlug) {
    console.error("Missing --repo <slug>");
    process.exit(1);
  }

  const config = loadConfig(getArg("--config"));
  const bbConfig = getBitbucketConfig(config);
  if (!bbConfig) process.exit(1);

  const cloud = new BitbucketCloud(bbConfig);
  const pullRequests = cloud.pullRequests(repoSlug, getArg("--workspace"));

  const showId = getId("--show");
  const commentId = getId("--comment");
  const approveId = getId("--approve");
  const mergeId = getId("--merge");

  if (showId !== undefined) {
    const pr = await pullRequests.get(showId);
    console.log(formatPR(pr));
    if (pr.description) console.log(`\n${pr.description}\n`);
    for (const p of pr.participants()) {
      const verdict = p.hasApproved ? "approved" : p.hasChangesRequested ? "changes requested" : "-";
      console.log(`  ${p.role.padEnd(11)} ${p.user.displayName ?? "Unknown"}: ${verdict}`);
    }
    return;
  }

  if (commentId !== undefined) {
    const pr = await pullRequests.get(commentId);
    await pr.comment(getArg("--message"));
    console.log(`Commented on #${pr.id}`);
    return;
  }

  if (approveId !== undefined) {
    const pr = await pullRequests.get(approveId);
    await pr.approve();
    console.log(`Approved #${pr.id}`);
    return;
  }

  if (mergeId !== undefined) {
    const pr = await pullRequests.get(mergeId);
    const closeBranch = args.includes("--close-branch") ? true : undefined;
    await pr.merge(getArg("--strategy"), closeBranch);
    console.log(`Merged #${pr.id}`);
    return;
  }

  const stateArg = getArg("--state");
  const states = stateArg ? [parseState(stateArg)] : undefined;

  let count = 0;
  for await (const pr of pullRequests.each(getArg("--q"), "-updated_on", states)) {
    console.log(formatPR(pr));
    count++;
  }
  console.log(`\n${count} pull request(s)`);
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? `${err.name}: ${err.message}` : String(err));
  process.exit(1);
});
