import * as path from 'path';
import * as yaml from 'js-yaml';
import {
  HealthReport,
  RenderedNodeConfig,
  SearchClusterOperator,
  TERMINATING_MESSAGE
} from '../../../src/operator/SearchClusterOperator';
import { OperatorOptions } from '../../../src/config/OperatorConfiguration';
import { PeerMembership } from '../../../src/cluster/membership/PeerMembership';
import { StaticLeadershipOracle } from '../../../src/cluster/leadership/StaticLeadershipOracle';
import { ReconciliationStatus } from '../../../src/cluster/types';
import { FakeClusterBackend, quorumWrite } from '../../helpers/fakeBackend';
import { SpyLogger } from '../../helpers/spyLogger';

describe('SearchClusterOperator', () => {
  const options: OperatorOptions = {
    clusterName: 'search',
    seedSize: 3,
    advertisedPort: 9200,
    applicationName: 'es',
    backendTimeout: 500,
    healthCheckInterval: 60000
  };

  let backend: FakeClusterBackend;
  let leadership: StaticLeadershipOracle;
  let membership: PeerMembership;
  let logger: SpyLogger;
  let operator: SearchClusterOperator;
  let health: HealthReport[];
  let nodeConfigs: RenderedNodeConfig[];

  const createOperator = (overrides: Partial<ConstructorParameters<typeof SearchClusterOperator>[0]> = {}) => {
    operator = new SearchClusterOperator({ options, leadership, membership, backend, logger, ...overrides });
    operator.on('health', (report: HealthReport) => health.push(report));
    operator.on('node-config', (rendered: RenderedNodeConfig) => nodeConfigs.push(rendered));
    return operator;
  };

  beforeEach(() => {
    backend = new FakeClusterBackend();
    leadership = new StaticLeadershipOracle(true);
    membership = new PeerMembership('es/0');
    logger = new SpyLogger();
    health = [];
    nodeConfigs = [];
  });

  afterEach(async () => {
    await operator.stop();
  });

  describe('start()', () => {
    it('should render node config and converge a single unit', async () => {
      createOperator();

      const report = await operator.start();

      expect(report.trigger).toBe('config-changed');
      expect(report.status).toBe(ReconciliationStatus.CONVERGED);
      expect(health).toHaveLength(1);
      expect(health[0].message).toBe('Cluster converged: 1 member(s), quorum 1, tolerates 0 failure(s)');

      expect(nodeConfigs).toHaveLength(1);
      const document = yaml.load(nodeConfigs[0].content);
      expect(document).toMatchObject({
        cluster: { name: 'search' },
        'discovery.zen.ping.unicast.hosts': ['es-0.es-endpoints', 'es-1.es-endpoints', 'es-2.es-endpoints']
      });
    });

    it('should publish a second node config when reactive seeding grows the list', async () => {
      createOperator({ initialSeeding: 'empty' });

      await operator.start();

      expect(nodeConfigs.map(rendered => rendered.seeds.length)).toEqual([0, 3]);
      expect(operator.getSeeds()).toHaveLength(3);
    });

    it('should refuse to start twice', async () => {
      createOperator();
      await operator.start();

      await expect(operator.start()).rejects.toThrow('Operator is already started');
    });
  });

  describe('membership changes', () => {
    it('should wait for the backend to see new members before raising quorum', async () => {
      createOperator();
      await operator.start();

      const waiting = await operator.peerJoined('es/1');
      expect(waiting.status).toBe(ReconciliationStatus.WAITING_FOR_MEMBERS);
      expect(health[1].message).toBe('Waiting for members: Backend reports 1 nodes, expected 2');

      backend.numberOfNodes = 2;
      const joined = await operator.peerJoined('es/2');
      expect(joined.status).toBe(ReconciliationStatus.WAITING_FOR_MEMBERS);
      expect(backend.writes).toEqual([]);

      backend.numberOfNodes = 3;
      const converged = await operator.healthTick();
      expect(converged.status).toBe(ReconciliationStatus.CONVERGED);
      expect(converged.quorumWritten).toBe(true);
      expect(backend.writes).toEqual([quorumWrite(2)]);
      expect(operator.getStatus()).toBe(ReconciliationStatus.CONVERGED);
    });

    it('should count departed peers out of the expected membership', async () => {
      createOperator();
      backend.numberOfNodes = 2;
      await operator.peerChanged('es/1', '10.0.0.5');

      const report = await operator.peerDeparted('es/1');

      expect(report.expectedMembers).toBe(1);
      expect(report.status).toBe(ReconciliationStatus.WAITING_FOR_MEMBERS);
    });

    it('should use an ingress address seen as a follower once elected leader', async () => {
      leadership.setLeader(false);
      createOperator();

      await operator.peerChanged('es/1', '10.0.0.5');
      expect(operator.getIngressAddress()).toBeUndefined();

      leadership.setLeader(true);
      await operator.healthTick();

      expect(operator.getIngressAddress()).toBe('10.0.0.5');
    });

    it('should report Degraded when the quorum write is rejected', async () => {
      createOperator();
      backend.numberOfNodes = 2;
      backend.writeError = new Error('HTTP 403: forbidden');
      membership.addPeer('es/1');
      backend.numberOfNodes = 3;

      const report = await operator.peerJoined('es/2');

      expect(report.status).toBe(ReconciliationStatus.DEGRADED);
      expect(health[0].message).toBe('Cluster degraded: HTTP 403: forbidden');
    });
  });

  describe('pass serialization', () => {
    it('should never run two passes at once', async () => {
      createOperator();
      let inFlight = 0;
      let maxInFlight = 0;
      const getHealth = backend.getHealth.bind(backend);
      jest.spyOn(backend, 'getHealth').mockImplementation(async () => {
        inFlight++;
        maxInFlight = Math.max(maxInFlight, inFlight);
        await new Promise(resolve => setTimeout(resolve, 5));
        inFlight--;
        return getHealth();
      });

      const reports = await Promise.all([
        operator.peerJoined('es/1'),
        operator.peerJoined('es/2'),
        operator.healthTick()
      ]);

      expect(maxInFlight).toBe(1);
      expect(reports.map(report => report.trigger)).toEqual(['peer-joined', 'peer-joined', 'health-tick']);
      // Peers are registered when the notification arrives, before the queued passes run
      expect(reports.map(report => report.expectedMembers)).toEqual([3, 3, 3]);
    });
  });

  describe('followers', () => {
    it('should report ready without contacting the backend', async () => {
      leadership.setLeader(false);
      createOperator();

      await operator.start();
      await operator.peerJoined('es/1');

      expect(health.map(entry => entry.message)).toEqual(['Unit is ready', 'Unit is ready']);
      expect(backend.healthCalls).toBe(0);
      expect(backend.writes).toEqual([]);
    });
  });

  describe('failures', () => {
    it('should turn an exception in a pass into a Degraded report', async () => {
      createOperator();
      jest.spyOn(membership, 'peerCount').mockReturnValue(-1);

      const report = await operator.healthTick();

      expect(report.status).toBe(ReconciliationStatus.DEGRADED);
      expect(report.reason).toBe('Peer count must be a non-negative integer, got -1');
      expect(operator.getStatus()).toBe(ReconciliationStatus.DEGRADED);
      expect(health[0].report).toBe(report);
      expect(logger.messages('error')).toEqual([
        'Reconciliation pass for health-tick failed: Peer count must be a non-negative integer, got -1'
      ]);
    });

    it('should keep processing passes after a health listener throws', async () => {
      createOperator();
      const throwing = jest.fn(() => {
        throw new Error('listener failed');
      });
      operator.once('health', throwing);

      await expect(operator.healthTick()).rejects.toThrow('listener failed');
      await expect(operator.healthTick()).resolves.toMatchObject({ status: ReconciliationStatus.CONVERGED });
    });

    it('should wait when no ingress address is known for the default client', async () => {
      createOperator({ backend: undefined });

      const report = await operator.healthTick();

      expect(report.status).toBe(ReconciliationStatus.WAITING_FOR_MEMBERS);
      expect(report.reason).toBe('Backend unreachable: No backend endpoint known yet');
    });
  });

  describe('configChanged()', () => {
    it('should re-render node config with the new cluster name', async () => {
      createOperator();
      await operator.start();

      await operator.configChanged({ clusterName: 'renamed' });

      expect(nodeConfigs).toHaveLength(2);
      expect(yaml.load(nodeConfigs[1].content)).toMatchObject({ cluster: { name: 'renamed' } });
      expect(operator.getOptions().clusterName).toBe('renamed');
    });
  });

  describe('stop()', () => {
    it('should report maintenance and reject later notifications', async () => {
      createOperator();
      const maintenance = jest.fn();
      operator.on('maintenance', maintenance);
      await operator.start();

      await operator.stop();

      expect(maintenance).toHaveBeenCalledWith({ message: TERMINATING_MESSAGE });
      await expect(operator.peerJoined('es/1')).rejects.toThrow('Operator is stopped, ignoring peer-joined');
    });
  });

  describe('fromConfigFile()', () => {
    it('should build an operator from the bundled options', async () => {
      operator = await SearchClusterOperator.fromConfigFile(
        path.resolve(__dirname, '../../../config/operator.yaml'),
        { leadership, membership, backend, logger },
        'production'
      );

      expect(operator.getOptions()).toMatchObject({
        clusterName: 'elasticsearch',
        backendTimeout: 10000,
        applicationName: 'elasticsearch'
      });
      expect(operator.getSeeds()[0]).toBe('elasticsearch-0.elasticsearch-endpoints');
    });
  });
});
