import dotenv from 'dotenv';
import { createApp } from './app';
import { loadConfig } from './config';
import { ClusterCapabilities } from './services/capability.service';
import { MeshInjectionService } from './services/mesh.service';
import { createDiscoveryClient, createKubeConfig, createObjectReader } from './utils/k8sClient';

dotenv.config();

async function main(): Promise<void> {
  const config = loadConfig();
  const kc = createKubeConfig();
  console.log(`☸️  Using Kubernetes context: ${kc.getCurrentContext()}`);

  const capabilities = new ClusterCapabilities(createDiscoveryClient(kc));
  const mesh = new MeshInjectionService(createObjectReader(kc), config.mesh);

  // Detection failures are fatal at startup
  const snapshot = await capabilities.detectAll();
  console.log(`🔐 Security context constraints: ${snapshot.securityPolicy}`);
  console.log(`🛡️  Seccomp profile support: ${snapshot.seccompProfile}`);
  console.log(`🕸️  Service mesh: ${snapshot.serviceMesh}`);

  if (config.redetectIntervalMs > 0) {
    setInterval(async () => {
      try {
        await capabilities.detectAll();
      } catch (err) {
        console.error('Capability re-detection error:', err);
      }
    }, config.redetectIntervalMs);
  }

  const app = createApp({ capabilities, mesh });
  app.listen(config.port, () => {
    console.log(`🚀 Capability API running on http://localhost:${config.port}`);
    console.log(`📊 Health check: http://localhost:${config.port}/health`);
  });
}

main().catch((err) => {
  console.error('❌ Startup failed:', err);
  process.exit(1);
});
