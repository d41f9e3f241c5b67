import assert from "node:assert/strict";
import { mkdtemp, rm, stat } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import test from "node:test";
import { ValidationError } from "../errors.js";
import { ClusterCredentialStore } from "./credentials.js";

let baseDir = "";

test.before(async () => {
  baseDir = await mkdtemp(path.join(tmpdir(), "envplane-credentials-test-"));
});

test.after(async () => {
  if (baseDir) {
    await rm(baseDir, { recursive: true, force: true });
  }
});

test("credential store saves, loads and removes by reference", async () => {
  const store = new ClusterCredentialStore(path.join(baseDir, "credentials"));

  const ref = await store.save("abc123", "apiVersion: v1\n");
  assert.equal(ref, "abc123.kubeconfig");
  assert.equal(await store.load(ref), "apiVersion: v1\n");

  const info = await stat(path.join(baseDir, "credentials", ref));
  assert.equal(info.mode & 0o777, 0o600);

  await store.remove(ref);
  assert.equal(await store.load(ref), null);
  await store.remove(ref);
});

test("credential store rejects references outside its directory", async () => {
  const store = new ClusterCredentialStore(path.join(baseDir, "credentials"));

  await assert.rejects(store.load("../environments.json"), ValidationError);
  await assert.rejects(store.save("../escape", "x"), ValidationError);
});
