import { promises as fs } from "node:fs";
import path from "node:path";

/**
 * Stand-in for the infrastructure tool used by provisioning tests. It logs
 * every invocation to `calls.log` beside the script and keeps a tiny state
 * file per workspace. A `cluster_name` containing "fail-apply" or
 * "fail-destroy" makes that subcommand exit 1 with a message on stderr.
 */
const FAKE_TOOL_SOURCE = `
import { appendFileSync, existsSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

const here = path.dirname(fileURLToPath(import.meta.url));
const [command, ...rest] = process.argv.slice(2);
appendFileSync(path.join(here, "calls.log"), JSON.stringify({ command, args: rest, cwd: process.cwd() }) + "\\n");

function readVars() {
  return JSON.parse(readFileSync("terraform.tfvars.json", "utf8"));
}

if (command === "init") {
  process.exit(0);
}

if (command === "apply") {
  const vars = readVars();
  await new Promise((resolve) => setTimeout(resolve, 30));
  if (String(vars.cluster_name).includes("fail-apply")) {
    process.stderr.write("Error: creating cluster: quota exceeded\\n");
    process.exit(1);
  }
  writeFileSync("state.json", JSON.stringify({ cluster_name: vars.cluster_name }));
  process.exit(0);
}

if (command === "destroy") {
  const vars = readVars();
  if (String(vars.cluster_name).includes("fail-destroy")) {
    process.stderr.write("Error: deleting cluster: still in use\\n");
    process.exit(1);
  }
  rmSync("state.json", { force: true });
  process.exit(0);
}

if (command === "output") {
  if (!existsSync("state.json")) {
    process.stdout.write("{}\\n");
    process.exit(0);
  }
  const state = JSON.parse(readFileSync("state.json", "utf8"));
  process.stdout.write(JSON.stringify({
    kubeconfig: { sensitive: true, type: "string", value: "apiVersion: v1\\nclusters:\\n- name: " + state.cluster_name + "\\n" },
    console_url: { sensitive: false, type: "string", value: "https://console.example.test/" + state.cluster_name }
  }));
  process.exit(0);
}

process.stderr.write("unknown command " + command + "\\n");
process.exit(2);
`;

export interface FakeToolCall {
  command: string;
  args: string[];
  cwd: string;
}

export async function writeFakeTool(dir: string): Promise<{ scriptPath: string; readCalls: () => Promise<FakeToolCall[]> }> {
  await fs.mkdir(dir, { recursive: true });
  const scriptPath = path.join(dir, "fake-tool.mjs");
  await fs.writeFile(scriptPath, FAKE_TOOL_SOURCE, "utf8");

  const readCalls = async (): Promise<FakeToolCall[]> => {
    try {
      const raw = await fs.readFile(path.join(dir, "calls.log"), "utf8");
      return raw
        .split("\n")
        .filter(Boolean)
        .map((line) => JSON.parse(line) as FakeToolCall);
    } catch {
      return [];
    }
  };

  return { scriptPath, readCalls };
}
