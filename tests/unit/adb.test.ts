import { execFile } from 'child_process';
import {
  ADBCommandResult,
  ADBCommandRunner,
  AdbDriver,
  chunkText,
  escapeAdbInputText,
  executeADBCommand,
  getConnectedDevices,
  parseDeviceList,
  parseForegroundPackage,
  parseResolvedComponent,
  parseWindowSize,
  resolveAdbBinary,
  selectDevice,
} from '../../src/utils/adb';
import {
  ADBCommandError,
  ADBNotFoundError,
  DeviceNotFoundError,
  MultipleDevicesFoundError,
  NoDevicesFoundError,
  ScreenshotCaptureError,
  ToolError,
} from '../../src/types';
import { mockHierarchyXml, mockScreenshotData } from '../mocks/fake-driver';

// Mock execFile
jest.mock('child_process', () => ({
  execFile: jest.fn(),
}));

const mockDeviceListOutput = `List of devices attached
emulator-5554          device product:sdk_gphone_x86 model:sdk_gphone_x86 transport_id:1
192.168.1.100:5555     device product:pixel model:pixel transport_id:2`;

const mockUnauthorizedDeviceListOutput = `List of devices attached
192.168.1.100:5555     unauthorized transport_id:2`;

function result(stdout: string | Buffer = '', stderr = '', exitCode = 0): ADBCommandResult {
  return {
    stdout: Buffer.isBuffer(stdout) ? stdout : Buffer.from(stdout),
    stderr: Buffer.from(stderr),
    exitCode,
  };
}

type ExecFileCallback = (error: Error | null, stdout: Buffer, stderr: Buffer) => void;

describe('ADB Utilities', () => {
  const mockExecFile = execFile as unknown as jest.Mock;

  function respond(error: Error | null, stdout = '', stderr = '') {
    mockExecFile.mockImplementation(
      (_file: string, _args: string[], _options: object, callback: ExecFileCallback) => {
        callback(error, Buffer.from(stdout), Buffer.from(stderr));
      }
    );
  }

  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('executeADBCommand', () => {
    it('should execute ADB command successfully', async () => {
      respond(null, 'List of devices attached');

      const output = await executeADBCommand('adb', ['devices']);

      expect(output.stdout.toString()).toBe('List of devices attached');
      expect(output.exitCode).toBe(0);
      expect(mockExecFile).toHaveBeenCalledWith(
        'adb',
        ['devices'],
        { encoding: 'buffer', timeout: 5000, maxBuffer: 50 * 1024 * 1024 },
        expect.any(Function)
      );
    });

    it('should throw ADBNotFoundError if the binary does not exist', async () => {
      respond(Object.assign(new Error('spawn adb ENOENT'), { code: 'ENOENT' }));

      await expect(executeADBCommand('adb', ['devices'])).rejects.toThrow(ADBNotFoundError);
    });

    it('should throw ADBCommandError if command fails', async () => {
      respond(Object.assign(new Error('Command failed'), { code: 1, killed: false }), '', 'error: device offline');

      await expect(executeADBCommand('adb', ['devices'])).rejects.toThrow(
        'adb command failed (adb devices): error: device offline'
      );
    });

    it('should resolve a failing command when check is false', async () => {
      respond(Object.assign(new Error('Command failed'), { code: 3, killed: false }), 'partial', '');

      const output = await executeADBCommand('adb', ['shell', 'false'], { check: false });

      expect(output.exitCode).toBe(3);
      expect(output.stdout.toString()).toBe('partial');
    });

    it('should report a timeout when the process is killed', async () => {
      respond(Object.assign(new Error('Command failed'), { code: null, killed: true }));

      await expect(executeADBCommand('adb', ['shell', 'sleep', '9'], { timeout: 100 })).rejects.toThrow(
        'adb command failed (adb shell sleep 9): timed out after 100ms'
      );
    });
  });

  describe('resolveAdbBinary', () => {
    it('should prefer an explicit path', () => {
      expect(resolveAdbBinary('/opt/adb', { MOBILE_RPC_ADB: '/env/adb' })).toBe('/opt/adb');
    });

    it('should fall back to MOBILE_RPC_ADB', () => {
      expect(resolveAdbBinary(undefined, { MOBILE_RPC_ADB: '/env/adb' })).toBe('/env/adb');
    });

    it('should throw ADBNotFoundError when nothing is found', () => {
      expect(() =>
        resolveAdbBinary(undefined, { PATH: '', ANDROID_HOME: '/nonexistent-sdk-root' })
      ).toThrow(ADBNotFoundError);
    });
  });

  describe('parseDeviceList', () => {
    it('should parse device list correctly', () => {
      const devices = parseDeviceList(mockDeviceListOutput);

      expect(devices).toHaveLength(2);
      expect(devices[0]).toEqual({
        id: 'emulator-5554',
        status: 'device',
        product: 'sdk_gphone_x86',
        model: 'sdk_gphone_x86',
        transportId: '1',
      });
      expect(devices[1].id).toBe('192.168.1.100:5555');
    });

    it('should return empty array for empty device list', () => {
      expect(parseDeviceList('List of devices attached')).toEqual([]);
    });

    it('should keep unauthorized devices with their status', () => {
      expect(parseDeviceList(mockUnauthorizedDeviceListOutput)[0].status).toBe('unauthorized');
    });
  });

  describe('getConnectedDevices', () => {
    it('should run devices -l', async () => {
      const run = jest.fn().mockResolvedValue(result(mockDeviceListOutput)) as jest.MockedFunction<ADBCommandRunner>;

      const devices = await getConnectedDevices('adb', run);

      expect(devices).toHaveLength(2);
      expect(run).toHaveBeenCalledWith('adb', ['devices', '-l']);
    });
  });

  describe('selectDevice', () => {
    it('should pick the only ready device', async () => {
      const run = jest.fn() as jest.MockedFunction<ADBCommandRunner>;
      run
        .mockResolvedValueOnce(
          result('List of devices attached\nemulator-5554 device\nR58M offline\n')
        )
        .mockResolvedValueOnce(result('device\n'));

      await expect(selectDevice('adb', undefined, run)).resolves.toBe('emulator-5554');
      expect(run).toHaveBeenLastCalledWith('adb', ['-s', 'emulator-5554', 'get-state'], { check: false });
    });

    it('should throw NoDevicesFoundError when no device is ready', async () => {
      const run = jest.fn().mockResolvedValue(result(mockUnauthorizedDeviceListOutput)) as jest.MockedFunction<ADBCommandRunner>;

      await expect(selectDevice('adb', undefined, run)).rejects.toThrow(NoDevicesFoundError);
    });

    it('should throw MultipleDevicesFoundError when the choice is ambiguous', async () => {
      const run = jest.fn().mockResolvedValue(result(mockDeviceListOutput)) as jest.MockedFunction<ADBCommandRunner>;

      await expect(selectDevice('adb', undefined, run)).rejects.toThrow(
        'Multiple adb devices found (emulator-5554, 192.168.1.100:5555)'
      );
      await expect(selectDevice('adb', undefined, run)).rejects.toThrow(MultipleDevicesFoundError);
    });

    it('should throw DeviceNotFoundError when the requested serial is not ready', async () => {
      const run = jest
        .fn()
        .mockResolvedValue(result('', "error: device 'R58M' not found", 1)) as jest.MockedFunction<ADBCommandRunner>;

      const attempt = selectDevice('adb', 'R58M', run);

      await expect(attempt).rejects.toThrow(DeviceNotFoundError);
      await expect(attempt).rejects.toThrow("adb device 'R58M' is not ready: error: device 'R58M' not found");
    });
  });

  describe('text helpers', () => {
    it('should escape spaces and shell specials for input text', () => {
      expect(escapeAdbInputText("a b's (x)")).toBe("a%sb\\'s%s\\(x\\)");
    });

    it('should split text into chunks of 80 characters', () => {
      expect(chunkText('a'.repeat(170)).map(chunk => chunk.length)).toEqual([80, 80, 10]);
      expect(chunkText('')).toEqual([]);
    });
  });

  describe('output parsers', () => {
    it('should prefer the override size', () => {
      expect(parseWindowSize('Physical size: 1080x2400\nOverride size: 720x1600')).toEqual({
        width: 720,
        height: 1600,
      });
      expect(parseWindowSize('Physical size: 1080x2400')).toEqual({ width: 1080, height: 2400 });
    });

    it('should throw when no size is reported', () => {
      expect(() => parseWindowSize('error')).toThrow(ADBCommandError);
    });

    it('should read the focused package', () => {
      const output = '  mCurrentFocus=Window{2c1f u0 com.example.app/com.example.app.MainActivity}';

      expect(parseForegroundPackage(output)).toBe('com.example.app');
      expect(parseForegroundPackage('nothing focused')).toBeUndefined();
    });

    it('should fall back to the focused app record', () => {
      const output = '  mFocusedApp=ActivityRecord{9a1 u0 com.example.mail/.Inbox t12}';

      expect(parseForegroundPackage(output)).toBe('com.example.mail');
    });

    it('should take the last component line from resolve-activity', () => {
      const output = 'priority=0 preferredOrder=0 match=0x108000 isDefault=true\ncom.example.app/.MainActivity\n';

      expect(parseResolvedComponent(output)).toBe('com.example.app/.MainActivity');
      expect(parseResolvedComponent('No activity found\n')).toBeUndefined();
    });
  });

  describe('AdbDriver', () => {
    let run: jest.MockedFunction<ADBCommandRunner>;
    let driver: AdbDriver;

    beforeEach(() => {
      run = jest.fn().mockResolvedValue(result()) as jest.MockedFunction<ADBCommandRunner>;
      driver = new AdbDriver('emulator-5554', '/sdk/adb', run);
    });

    it('should target its serial for taps', async () => {
      await driver.sendTap(10, 20);

      expect(run).toHaveBeenCalledWith(
        '/sdk/adb',
        ['-s', 'emulator-5554', 'shell', 'input', 'tap', '10', '20'],
        { timeout: 8000 }
      );
    });

    it('should send swipes with a duration', async () => {
      await driver.sendSwipe(1, 2, 3, 4, 550);

      expect(run).toHaveBeenCalledWith(
        '/sdk/adb',
        ['-s', 'emulator-5554', 'shell', 'input', 'swipe', '1', '2', '3', '4', '550'],
        { timeout: 10000 }
      );
    });

    it('should escape text before sending it', async () => {
      await driver.sendText('hello world');

      expect(run).toHaveBeenCalledWith(
        '/sdk/adb',
        ['-s', 'emulator-5554', 'shell', 'input', 'text', 'hello%sworld'],
        { timeout: 10000 }
      );
    });

    it('should dump and read the hierarchy, skipping leading noise', async () => {
      run
        .mockResolvedValueOnce(result('UI hierchary dumped to: /sdcard/window_dump.xml'))
        .mockResolvedValueOnce(result(`noise\n${mockHierarchyXml}`));

      await expect(driver.captureHierarchy()).resolves.toBe(mockHierarchyXml);
      expect(run).toHaveBeenNthCalledWith(
        1,
        '/sdk/adb',
        ['-s', 'emulator-5554', 'shell', 'uiautomator', 'dump', '/sdcard/window_dump.xml'],
        { timeout: 12000 }
      );
      expect(run).toHaveBeenNthCalledWith(
        2,
        '/sdk/adb',
        ['-s', 'emulator-5554', 'exec-out', 'cat', '/sdcard/window_dump.xml'],
        { timeout: 12000 }
      );
    });

    it('should fail when the dump is not a hierarchy', async () => {
      run.mockResolvedValue(result('ERROR: could not get idle state.'));

      await expect(driver.captureHierarchy()).rejects.toThrow(ToolError);
    });

    it('should return PNG bytes from screencap', async () => {
      run.mockResolvedValue(result(mockScreenshotData));

      await expect(driver.captureScreenImage()).resolves.toEqual(mockScreenshotData);
    });

    it('should reject screencap output that is not PNG', async () => {
      run.mockResolvedValue(result('not a png'));

      await expect(driver.captureScreenImage()).rejects.toThrow(ScreenshotCaptureError);
    });

    it('should resolve the launcher component', async () => {
      run.mockResolvedValue(result('priority=0\ncom.example.app/.MainActivity\n'));

      await expect(driver.resolveLaunchTarget('com.example.app')).resolves.toBe('com.example.app/.MainActivity');
      expect(run).toHaveBeenCalledWith(
        '/sdk/adb',
        ['-s', 'emulator-5554', 'shell', 'cmd', 'package', 'resolve-activity', '--brief', 'com.example.app'],
        { timeout: 10000, check: false }
      );
    });

    it('should report no launch target when resolve-activity fails', async () => {
      run.mockResolvedValue(result('', 'Unknown command', 255));

      await expect(driver.resolveLaunchTarget('com.example.app')).resolves.toBeUndefined();
    });

    it('should treat Error output from am start as a failed launch', async () => {
      run.mockResolvedValue(result('Starting: Intent { cmp=com.example.app/.Main }\nError: Activity class does not exist.'));

      const outcome = await driver.launch({ kind: 'component', component: 'com.example.app/.Main' });

      expect(outcome).toEqual({
        ok: false,
        output: 'Starting: Intent { cmp=com.example.app/.Main }\nError: Activity class does not exist.',
      });
    });

    it('should launch a package through monkey', async () => {
      run.mockResolvedValue(result('Events injected: 1'));

      const outcome = await driver.launch({ kind: 'package', packageName: 'com.example.app' });

      expect(outcome.ok).toBe(true);
      expect(run).toHaveBeenCalledWith(
        '/sdk/adb',
        [
          '-s',
          'emulator-5554',
          'shell',
          'monkey',
          '-p',
          'com.example.app',
          '-c',
          'android.intent.category.LAUNCHER',
          '1',
        ],
        { timeout: 12000, check: false }
      );
    });

    it('should report monkey failures', async () => {
      run.mockResolvedValue(result('** No activities found to run, monkey aborted.'));

      const outcome = await driver.launch({ kind: 'package', packageName: 'com.example.none' });

      expect(outcome.ok).toBe(false);
    });
  });
});
