import { ConfigModule } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { CliModule } from '../src/cli/cli.module';
import { ExitCode } from '../src/cli/exit-codes';
import { SmartplugCommand } from '../src/cli/smartplug.command';
import { CommandRunner } from '../src/commands/command-runner.service';
import { validateEnvironment } from '../src/config/smartplug.config';
import { SmartplugRunService } from '../src/metrics/smartplug-run.service';
import { FakeCommandRunner } from './utils/fake-command-runner';
import {
  HS110_FIELDS,
  KASA_EMETER,
  KP115_FIELDS,
  kasaSysinfo,
} from './utils/mock-data';

/**
 * E2E tests for a complete run
 *
 * Uses the real modules from the command down to the sender; only the
 * child processes (kasa and zabbix_sender) are replaced by
 * FakeCommandRunner.
 */
describe('Smartplug run (e2e)', () => {
  let moduleFixture: TestingModule;
  let runner: FakeCommandRunner;
  let command: SmartplugCommand;
  let runService: SmartplugRunService;

  const argv = [
    '--host',
    '192.0.2.10',
    '--zabbix-server',
    'zabbix.example.test',
    '--zabbix-host',
    'desk-plug',
  ];

  const options = {
    deviceHost: '192.0.2.10',
    ingestTarget: 'zabbix.example.test',
    ingestHostLabel: 'desk-plug',
    verbose: false,
  };

  beforeEach(async () => {
    runner = new FakeCommandRunner();
    runner.emeterOutput = KASA_EMETER;
    runner.sysinfoOutput = kasaSysinfo(HS110_FIELDS);

    moduleFixture = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          ignoreEnvFile: true,
          validate: validateEnvironment,
        }),
        CliModule,
      ],
    })
      .overrideProvider(CommandRunner)
      .useValue(runner)
      .compile();
    await moduleFixture.init();

    command = moduleFixture.get<SmartplugCommand>(SmartplugCommand);
    runService = moduleFixture.get<SmartplugRunService>(SmartplugRunService);
  });

  afterEach(async () => {
    await moduleFixture.close();
  });

  describe('HS110', () => {
    it('should exit 0 after sending every common metric', async () => {
      await expect(command.execute(argv)).resolves.toBe(ExitCode.SUCCESS);
      expect(runner.sentLines()).toHaveLength(27);
    });

    it('should query each device reading exactly once', async () => {
      await runService.run(options);

      expect(runner.kasaCalls('emeter')).toHaveLength(1);
      expect(runner.kasaCalls('sysinfo')).toHaveLength(1);
    });

    it('should send the shaped values', async () => {
      await runService.run(options);
      const lines = runner.sentLines();

      expect(lines[0]).toBe('- tplink_smartplug[active_mode] none');
      expect(lines).toEqual(
        expect.arrayContaining([
          '- tplink_smartplug[alias] Desk Lamp',
          '- tplink_smartplug[current_ma] 0.12',
          '- tplink_smartplug[icon_hash] empty',
          '- tplink_smartplug[led_off] 1',
          '- tplink_smartplug[next_action] -1',
          '- tplink_smartplug[power_mw] 15.68',
          '- tplink_smartplug[total_wh] 12.35',
          '- tplink_smartplug[type] IOT.SMARTPLUGSWITCH',
        ]),
      );
      expect(lines[26]).toBe('- tplink_smartplug[voltage_mv] 230.46');
    });

    it('should send on_time as a timestamp', async () => {
      await runService.run(options);

      const onTime = runner
        .sentLines()
        .find((line) => line.startsWith('- tplink_smartplug[on_time] '));
      expect(onTime).toMatch(
        /^- tplink_smartplug\[on_time\] \d{2}\.\d{2}\.\d{4} \d{2}:\d{2}:\d{2}$/,
      );
    });

    it('should send an empty on_time when it is out of range', async () => {
      runner.sysinfoOutput = kasaSysinfo(HS110_FIELDS, {
        on_time: 10000000000000,
      });

      const report = await runService.run(options);

      expect(report.status).toBe('success');
      expect(runner.sentLines()).toHaveLength(27);
      expect(runner.sentLines()).toContain('- tplink_smartplug[on_time] ');
    });

    it('should attempt every item when the server rejects some', async () => {
      runner.senderFails = (line) =>
        line.includes('[rssi]') || line.includes('[mac]');

      const report = await runService.run(options);

      expect(runner.sentLines()).toHaveLength(27);
      expect(report.status).toBe('metrics-failed');
      expect(report.sent).toBe(25);
      expect(report.failures.map((failure) => failure.metricName)).toEqual([
        'mac',
        'rssi',
      ]);
    });

    it('should fail the energy metrics when only the emeter query fails', async () => {
      runner.unreachableQueries.add('emeter');

      const report = await runService.run(options);

      expect(runner.kasaCalls('emeter')).toHaveLength(1);
      expect(report.sent).toBe(23);
      expect(report.failures).toEqual(
        ['current_ma', 'power_mw', 'total_wh', 'voltage_mv'].map(
          (metricName) => ({
            metricName,
            code: 7,
            reason: '[emeter@192.0.2.10] kasa exited with code 1: No device found',
          }),
        ),
      );
    });

    it('should exit 6 when items fail', async () => {
      runner.senderFails = (line) => line.includes('[rssi]');

      await expect(command.execute(argv)).resolves.toBe(ExitCode.ITEMS_FAILED);
    });
  });

  describe('KP115', () => {
    beforeEach(() => {
      runner.sysinfoOutput = kasaSysinfo(KP115_FIELDS);
    });

    it('should send the model extensions after the common metrics', async () => {
      const report = await runService.run(options);
      const lines = runner.sentLines();

      expect(report).toMatchObject({
        status: 'success',
        hardwareModel: 'KP115_EU_',
        sent: 31,
      });
      expect(lines.slice(27)).toEqual([
        '- tplink_smartplug[type] IOT.SMARTPLUGSWITCH',
        '- tplink_smartplug[ntc_state] 0',
        '- tplink_smartplug[obd_src] tplink',
        '- tplink_smartplug[status] new',
      ]);
    });

    it('should send null for common fields the model lacks', async () => {
      await runService.run(options);

      expect(runner.sentLines()).toEqual(
        expect.arrayContaining([
          '- tplink_smartplug[fwId] null',
          '- tplink_smartplug[type] null',
          '- tplink_smartplug[led_off] 0',
        ]),
      );
    });
  });

  describe('initialization failures', () => {
    it('should exit 5 for an unsupported model without sending', async () => {
      runner.sysinfoOutput = kasaSysinfo(HS110_FIELDS, { model: 'HS100(US)' });

      await expect(command.execute(argv)).resolves.toBe(ExitCode.INIT_FAILED);
      expect(runner.sentLines()).toEqual([]);
    });

    it('should exit 5 for an unreachable plug after a single query', async () => {
      runner.kasaExitCode = 1;

      const report = await runService.run(options);

      expect(report.status).toBe('init-failed');
      expect(report.preflightFailure?.code).toBe(2);
      expect(runner.calls.filter((call) => call.binary === 'kasa')).toHaveLength(1);
    });

    it('should exit 5 when zabbix_sender is not installed', async () => {
      runner.installed.delete('zabbix_sender');

      await expect(command.execute(argv)).resolves.toBe(ExitCode.INIT_FAILED);
      expect(runner.calls).toEqual([]);
    });
  });
});
