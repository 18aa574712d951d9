import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import type { ClusterCapabilities } from './services/capability.service';
import type { MeshInjectionService } from './services/mesh.service';
import { createCapabilityRoutes } from './routes/capability.routes';
import { createMeshRoutes } from './routes/mesh.routes';

export interface AppServices {
  capabilities: ClusterCapabilities;
  mesh: MeshInjectionService;
}

export function createApp({ capabilities, mesh }: AppServices) {
  const app = express();

  // Middleware
  app.use(helmet());
  app.use(cors());
  app.use(express.json());

  // Health check
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      service: 'cluster-capabilities',
      timestamp: new Date().toISOString(),
    });
  });

  // Routes
  app.use('/api/capabilities', createCapabilityRoutes(capabilities));
  app.use('/api/mesh', createMeshRoutes(mesh));

  return app;
}
