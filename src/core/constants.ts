// 电台默认 TCP 端口（固件 API 服务）
export const DEFAULT_TCP_PORT = 4403;

export const AUTODETECT_SERIAL = 'auto';

export const DEFAULT_SCAN_INTERVAL_SEC = 30;
export const MIN_SCAN_INTERVAL_SEC = 10;
export const MAX_SCAN_INTERVAL_SEC = 3600;

export const DEFAULT_OPEN_TIMEOUT_MS = 15000;
export const DEFAULT_DISCOVERY_TIMEOUT_MS = 500;

export const IGNORED_PORT_PREFIXES: readonly string[] = ['/dev/ttyS', '/dev/cu.Bluetooth', '/dev/tty.Bluetooth'];

export interface UsbIdPair {
  vid: number;
  pid: number;
}

/**
 * 已知电台硬件的 USB (VID, PID)。新增硬件只需在这里加一行。
 */
export const RADIO_USB_IDS: readonly UsbIdPair[] = [
  { vid: 0x10c4, pid: 0xea60 }, // Silicon Labs CP210x (T-Beam, Heltec V2)
  { vid: 0x1a86, pid: 0x55d4 }, // WCH CH9102
  { vid: 0x1a86, pid: 0x7523 }, // WCH CH340
  { vid: 0x0403, pid: 0x6001 }, // FTDI FT232R
  { vid: 0x303a, pid: 0x1001 }, // Espressif ESP32-S3 USB JTAG/serial (Heltec V3, T-Deck)
  { vid: 0x303a, pid: 0x0002 }, // Espressif ESP32-S2/S3 CDC
  { vid: 0x239a, pid: 0x8029 }, // Adafruit nRF52 bootloader family (RAK4631)
  { vid: 0x239a, pid: 0x0029 },
  { vid: 0x239a, pid: 0x4405 },
  { vid: 0x2886, pid: 0x0057 }, // Seeed nRF52 (T1000-E)
  { vid: 0x1915, pid: 0x520f }, // Nordic nRF52840
  { vid: 0x2e8a, pid: 0x000a }, // Raspberry Pi RP2040
];

export const REBOOT_DELAY_SEC = 10;
