import { after, before, describe, it } from 'node:test';
import assert from 'node:assert';
import type { Server } from 'node:http';
import { createApp } from './app';
import { ClusterCapabilities } from './services/capability.service';
import { MeshInjectionService } from './services/mesh.service';
import { FakeDiscovery, FakeObjects } from './testing/fakeCluster';

async function readJson(res: Response): Promise<Record<string, unknown>> {
  const body: unknown = await res.json();
  assert.ok(typeof body === 'object' && body !== null && !Array.isArray(body));
  return { ...body };
}

describe('capability API', () => {
  const discovery = new FakeDiscovery({
    'networking.istio.io/v1beta1': ['sidecars'],
    'monitoring.coreos.com/v1': ['podmonitors'],
  });
  discovery.version = { major: '1', minor: '29+' };
  const objects = new FakeObjects()
    .withNamespace('shop', { 'istio-injection': 'enabled' })
    .withPod('shop', 'web-0')
    .withPod('shop', 'db-0', { 'sidecar.istio.io/inject': 'false' });

  const capabilities = new ClusterCapabilities(discovery);
  const app = createApp({ capabilities, mesh: new MeshInjectionService(objects) });
  let server: Server;
  let baseUrl: string;

  before(async () => {
    await new Promise<void>((resolve) => {
      server = app.listen(0, () => resolve());
    });
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('server is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  after(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  });

  it('GET /health', async () => {
    const res = await fetch(`${baseUrl}/health`);
    assert.strictEqual(res.status, 200);
    const body = await readJson(res);
    assert.strictEqual(body.status, 'ok');
    assert.strictEqual(body.service, 'cluster-capabilities');
  });

  it('reports undetected flags as null, then detected values', async () => {
    let res = await fetch(`${baseUrl}/api/capabilities`);
    assert.deepStrictEqual(await res.json(), {
      securityPolicy: null,
      seccompProfile: null,
      serviceMesh: null,
      detectedAt: null,
    });

    res = await fetch(`${baseUrl}/api/capabilities/detect`, { method: 'POST' });
    assert.strictEqual(res.status, 200);
    const detected = await readJson(res);
    assert.strictEqual(detected.securityPolicy, false);
    assert.strictEqual(detected.seccompProfile, true);
    assert.strictEqual(detected.serviceMesh, true);
    assert.strictEqual(typeof detected.detectedAt, 'string');

    const callsAfterDetect = discovery.resourceCalls.length;
    res = await fetch(`${baseUrl}/api/capabilities`);
    assert.deepStrictEqual(await res.json(), detected);
    assert.strictEqual(discovery.resourceCalls.length, callsAfterDetect);
  });

  it('GET /api/capabilities/pod-monitor', async () => {
    const res = await fetch(`${baseUrl}/api/capabilities/pod-monitor`);
    assert.deepStrictEqual(await res.json(), { exists: true });
  });

  it('GET /api/mesh/namespaces/:namespace', async () => {
    const res = await fetch(`${baseUrl}/api/mesh/namespaces/shop`);
    assert.deepStrictEqual(await res.json(), { namespace: 'shop', injectionEnabled: true });
  });

  it('reads the namespace and the pod once per pod lookup', async () => {
    const namespaceReads = objects.namespaceReads;
    const podReads = objects.podReads;
    const res = await fetch(`${baseUrl}/api/mesh/namespaces/shop/pods/web-0`);
    assert.strictEqual(res.status, 200);
    assert.strictEqual(objects.namespaceReads - namespaceReads, 1);
    assert.strictEqual(objects.podReads - podReads, 1);
  });

  it('GET /api/mesh/namespaces/:namespace/pods/:pod', async () => {
    let res = await fetch(`${baseUrl}/api/mesh/namespaces/shop/pods/web-0`);
    assert.deepStrictEqual(await res.json(), { namespace: 'shop', pod: 'web-0', ignored: false, injected: true });

    res = await fetch(`${baseUrl}/api/mesh/namespaces/shop/pods/db-0`);
    assert.deepStrictEqual(await res.json(), { namespace: 'shop', pod: 'db-0', ignored: true, injected: false });
  });

  it('answers 404 for a missing namespace', async () => {
    const res = await fetch(`${baseUrl}/api/mesh/namespaces/ghost`);
    assert.strictEqual(res.status, 404);
    assert.deepStrictEqual(await res.json(), { error: 'namespace "ghost" not found' });
  });

  it('answers 502 when the server version is malformed', async () => {
    discovery.version = { major: '1', minor: 'v29' };
    const res = await fetch(`${baseUrl}/api/capabilities/detect`, { method: 'POST' });
    assert.strictEqual(res.status, 502);
    assert.deepStrictEqual(await res.json(), { error: 'invalid Kubernetes version: "v29"' });
    discovery.version = { major: '1', minor: '29+' };
  });
});
