import { Router, type Request, type Response } from 'express';
import type { MeshInjectionService } from '../services/mesh.service';
import { sendError } from './errors';

export function createMeshRoutes(mesh: MeshInjectionService): Router {
  const router = Router();

  /**
   * Is injection enabled for a namespace
   */
  router.get('/namespaces/:namespace', async (req: Request, res: Response) => {
    const { namespace } = req.params;
    try {
      const injectionEnabled = await mesh.isNamespaceInjectionEnabled(namespace);
      res.json({ namespace, injectionEnabled });
    } catch (error) {
      sendError(res, error, 'Failed to read namespace');
    }
  });

  /**
   * Does a pod opt out, and will it get a sidecar
   */
  router.get('/namespaces/:namespace/pods/:pod', async (req: Request, res: Response) => {
    const { namespace, pod } = req.params;
    try {
      const enabled = await mesh.isNamespaceInjectionEnabled(namespace);
      const ignored = await mesh.isPodIgnored(namespace, pod);
      const injected = enabled && !ignored;
      res.json({ namespace, pod, ignored, injected });
    } catch (error) {
      sendError(res, error, 'Failed to read pod');
    }
  });

  return router;
}
