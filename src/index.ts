import type { Server } from "node:http";
import { createApp } from "./app.js";
import { TenantDeclarationBootstrapper } from "./cluster/bootstrap.js";
import { ClusterCredentialStore } from "./cluster/credentials.js";
import { KubernetesStatusAggregator } from "./cluster/statusAggregator.js";
import { intFromEnv } from "./envConfig.js";
import { loadLifecycleConfig } from "./environments/config.js";
import { EnvironmentLifecycleManager } from "./environments/lifecycle.js";
import { FileEnvironmentStore } from "./environments/store.js";
import { WorkflowQueue } from "./environments/workflowQueue.js";
import { errorMessage, logError, logInfo } from "./observability/logger.js";
import { credentialsDir, environmentsFile, resolveDataRoot, tenantsFile } from "./persistence/paths.js";
import { loadProvisioningConfig } from "./provisioning/config.js";
import { WorkspaceExecutor } from "./provisioning/executor.js";
import { ProvisioningOrchestrator } from "./provisioning/orchestrator.js";
import { type ClusterApi, KubernetesClusterApi, loadKubeConfig } from "./tenancy/clusterApi.js";
import { loadTenancyConfig } from "./tenancy/config.js";
import { InMemoryClusterApi } from "./tenancy/inMemoryClusterApi.js";
import { TenantReconciler } from "./tenancy/reconciler.js";
import { FileTenantStore } from "./tenancy/store.js";

const dataRoot = resolveDataRoot();
const lifecycleConfig = loadLifecycleConfig();
const provisioningConfig = loadProvisioningConfig(dataRoot);
const tenancyConfig = loadTenancyConfig();
const PORT = intFromEnv(process.env, "PORT", 4000, { min: 0, max: 65_535 });

const tenants = new FileTenantStore(tenantsFile(dataRoot));
const credentials = new ClusterCredentialStore(credentialsDir(dataRoot));
const queue = new WorkflowQueue(lifecycleConfig.workflowConcurrency);

const manager = new EnvironmentLifecycleManager({
  store: new FileEnvironmentStore(environmentsFile(dataRoot)),
  provisioner: new ProvisioningOrchestrator(
    provisioningConfig,
    new WorkspaceExecutor({
      binary: provisioningConfig.binary,
      binaryArgs: provisioningConfig.binaryArgs,
      timeoutMs: provisioningConfig.commandTimeoutMs
    })
  ),
  credentials,
  bootstrapper: new TenantDeclarationBootstrapper(tenants, tenancyConfig.defaults),
  statusAggregator: new KubernetesStatusAggregator(credentials),
  queue,
  clusterDefaults: provisioningConfig,
  module: provisioningConfig.defaultModule,
  retry: lifecycleConfig.retry
});

const cluster: ClusterApi =
  tenancyConfig.clusterMode === "memory"
    ? new InMemoryClusterApi()
    : new KubernetesClusterApi(loadKubeConfig(tenancyConfig.kubeconfigPath));
const reconciler = new TenantReconciler(tenants, cluster, tenancyConfig);

const recovered = await manager.recoverInterruptedWorkflows();
if (recovered.length > 0) {
  logInfo("interrupted workflows recovered", { data: { environments: recovered.map((record) => record.id) } });
}

const app = createApp({ manager });
const server: Server = app.listen(PORT, () => {
  logInfo("envplane listening", {
    data: { port: PORT, data_root: dataRoot, cluster_mode: tenancyConfig.clusterMode, cluster_name: tenancyConfig.clusterName ?? null }
  });
});
reconciler.start();

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logInfo("shutdown requested", { data: { signal, workflows_in_flight: queue.size } });
  server.close();
  await reconciler.stop();
  // Started workflows run to completion.
  await queue.onIdle();
  logInfo("shutdown complete");
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    shutdown(signal).then(
      () => process.exit(0),
      (error: unknown) => {
        logError("shutdown failed", { data: { error: errorMessage(error) } });
        process.exit(1);
      }
    );
  });
}
