/**
 * lsusb -v Parser
 * Indentation-scoped recursive descent over the tokenized dump
 */

import {
  createAudioControl,
  createConfiguration,
  createDeviceDescriptor,
  createEndpoint,
  createInterface,
  type ConfigurationDraft,
  type Draft,
  type InterfaceDraft,
} from "../model/entities";
import { UsbAudioDevice } from "../model/device";
import {
  AudioSubclass,
  UacVersion,
  USB_CLASS_AUDIO,
  type AlternateSetting,
  type AudioStreamingInterface,
  type ConfigurationDescriptor,
  type DeviceDescriptor,
  type EndpointDescriptor,
  type InterfaceDescriptor,
  type SyncType,
  type TransferType,
  type UsageType,
} from "../model/types";
import { createLogger } from "../logger";
import { acDescriptorFor, dialectOf, readAudioControl } from "./audio-control";
import { asDescriptorFor, readFormatType, readGeneral } from "./audio-streaming";
import { applyField, decodeInt, defineFields, trailingLabel } from "./fields";
import { LineCursor, tokenize, type Line } from "./lines";

const log = createLogger("parser");

// Section headers
const DEVICE = "Device Descriptor:";
const CONFIGURATION = "Configuration Descriptor:";
const INTERFACE = "Interface Descriptor:";
const ENDPOINT = "Endpoint Descriptor:";
const AUDIO_CONTROL = "AudioControl Interface Descriptor:";
const AUDIO_STREAMING = "AudioStreaming Interface Descriptor:";
const AS_ENDPOINT = "AudioStreaming Endpoint Descriptor:";
const AC_ENDPOINT = "AudioControl Endpoint Descriptor:";

const TRANSFER_TYPES: TransferType[] = ["Control", "Isochronous", "Bulk", "Interrupt"];
const SYNC_TYPES: SyncType[] = ["none", "async", "adaptive", "sync"];
const USAGE_TYPES: UsageType[] = ["data", "feedback", "implicit_feedback", "data"];

const DEVICE_FIELDS = defineFields<Draft<DeviceDescriptor>>([
  { prefix: "bcdUSB", decode: "word", set: (t, v) => { t.usbVersion = v; } },
  { prefix: "bDeviceClass", decode: "int", set: (t, v) => { t.deviceClass = v; } },
  { prefix: "bDeviceSubClass", decode: "int", set: (t, v) => { t.deviceSubclass = v; } },
  { prefix: "bDeviceProtocol", decode: "int", set: (t, v) => { t.deviceProtocol = v; } },
  { prefix: "bMaxPacketSize0", decode: "int", set: (t, v) => { t.maxPacketSize0 = v; } },
  {
    prefix: "idVendor",
    decode: "hex",
    set: (t, v, raw) => {
      t.vendorId = v;
      t.manufacturer = trailingLabel(raw) || t.manufacturer;
    },
  },
  {
    prefix: "idProduct",
    decode: "hex",
    set: (t, v, raw) => {
      t.productId = v;
      t.product = trailingLabel(raw) || t.product;
    },
  },
  { prefix: "bcdDevice", decode: "bcd", set: (t, v) => { t.bcdDevice = v; } },
  // String descriptors win over the USB ID database names when present
  { prefix: "iManufacturer", decode: "string", set: (t, v) => { t.manufacturer = v || t.manufacturer; } },
  { prefix: "iProduct", decode: "string", set: (t, v) => { t.product = v || t.product; } },
  { prefix: "iSerial", decode: "string", set: (t, v) => { t.serialNumber = v; } },
  { prefix: "bNumConfigurations", decode: "int", set: (t, v) => { t.numConfigurations = v; } },
]);

const CONFIGURATION_FIELDS = defineFields<ConfigurationDraft>([
  { prefix: "bConfigurationValue", decode: "int", set: (t, v) => { t.configValue = v; } },
  { prefix: "bNumInterfaces", decode: "int", set: (t, v) => { t.numInterfaces = v; } },
  { prefix: "iConfiguration", decode: "string", set: (t, v) => { t.name = v; } },
  { prefix: "bmAttributes", decode: "hex", set: (t, v) => { t.attributes = v; } },
  { prefix: "MaxPower", decode: "int", set: (t, v) => { t.maxPowerMa = v; } },
]);

const INTERFACE_FIELDS = defineFields<InterfaceDraft>([
  { prefix: "bInterfaceNumber", decode: "int", set: (t, v) => { t.interfaceNumber = v; } },
  { prefix: "bAlternateSetting", decode: "int", set: (t, v) => { t.alternateSetting = v; } },
  { prefix: "bNumEndpoints", decode: "int", set: (t, v) => { t.numEndpoints = v; } },
  { prefix: "bInterfaceClass", decode: "int", set: (t, v) => { t.interfaceClass = v; } },
  { prefix: "bInterfaceSubClass", decode: "int", set: (t, v) => { t.interfaceSubclass = v; } },
  { prefix: "bInterfaceProtocol", decode: "int", set: (t, v) => { t.interfaceProtocol = v; } },
  { prefix: "iInterface", decode: "string", set: (t, v) => { t.name = v; } },
]);

const ENDPOINT_FIELDS = defineFields<Draft<EndpointDescriptor>>([
  {
    prefix: "bEndpointAddress",
    decode: "hex",
    set: (t, v) => {
      t.address = v;
      t.direction = v & 0x80 ? "IN" : "OUT";
    },
  },
  {
    prefix: "bmAttributes",
    decode: "int",
    set: (t, v) => {
      t.transferType = TRANSFER_TYPES[v & 0x03];
      if (t.transferType === "Isochronous") {
        t.syncType = SYNC_TYPES[(v >> 2) & 0x03];
        t.usageType = USAGE_TYPES[(v >> 4) & 0x03];
      }
    },
  },
  {
    prefix: "wMaxPacketSize",
    decode: "hex",
    set: (t, v) => {
      t.maxPacketSize = v & 0x7ff;
      t.transactionsPerMicroframe = ((v >> 11) & 0x03) + 1;
    },
  },
  { prefix: "bInterval", decode: "int", set: (t, v) => { t.interval = v; } },
  { prefix: "bRefresh", decode: "int", set: (t, v) => { t.refresh = v; } },
  { prefix: "bSynchAddress", decode: "hex", set: (t, v) => { t.synchAddress = v; } },
]);

// Class-specific endpoint descriptor, merged into the endpoint it follows
const AUDIO_ENDPOINT_FIELDS = defineFields<Draft<EndpointDescriptor>>([
  { prefix: "bmAttributes", decode: "hex", set: (t, v) => { t.maxPacketsOnly = (v & 0x80) !== 0; } },
  { prefix: "bLockDelayUnits", decode: "int", set: (t, v) => { t.lockDelayUnits = v; } },
  { prefix: "wLockDelay", decode: "auto", set: (t, v) => { t.lockDelay = v; } },
]);

interface DeviceDraft {
  descriptor: Draft<DeviceDescriptor>;
  configurations: ConfigurationDescriptor[];
}

type SectionHandlers = Record<string, () => void>;

function subtypeOf(lines: readonly Line[]): number {
  const line = lines.find((l) => l.content.toLowerCase().startsWith("bdescriptorsubtype"));
  return line ? decodeInt(line.content.slice("bDescriptorSubtype".length)) : 0;
}

function isStreamingInterface(iface: InterfaceDescriptor): boolean {
  return (
    iface.interfaceClass === USB_CLASS_AUDIO &&
    iface.interfaceSubclass === AudioSubclass.STREAMING
  );
}

/**
 * Data endpoint of an interface: the first data-usage endpoint,
 * else the first endpoint
 */
function dataEndpoint(iface: InterfaceDescriptor): EndpointDescriptor | null {
  return iface.endpoints.find((ep) => ep.usageType === "data") ?? iface.endpoints[0] ?? null;
}

export class DescriptorParser {
  private readonly cursor: LineCursor;
  private readonly drafts: DeviceDraft[] = [];

  constructor(text: string) {
    this.cursor = new LineCursor(tokenize(text));
  }

  parse(): UsbAudioDevice[] {
    while (!this.cursor.atEnd) {
      const line = this.cursor.current;
      if (line?.content.startsWith(DEVICE)) {
        this.drafts.push(this.parseDevice());
      } else if (line?.content.startsWith(CONFIGURATION)) {
        // A configuration excerpt without its device header
        this.currentDraft().configurations.push(this.parseConfiguration());
      } else {
        this.cursor.advance();
      }
    }

    return this.drafts.map(
      (draft) => new UsbAudioDevice(draft.descriptor, draft.configurations)
    );
  }

  private currentDraft(): DeviceDraft {
    const last = this.drafts[this.drafts.length - 1];
    if (last) return last;

    const draft: DeviceDraft = { descriptor: createDeviceDescriptor(), configurations: [] };
    this.drafts.push(draft);
    return draft;
  }

  /**
   * Walk the body of the section whose header is the current line.
   * Nested headers go to their handler, which consumes its own section;
   * every other line is offered to onField.
   */
  private section(handlers: SectionHandlers, onField: (content: string) => void): void {
    const header = this.cursor.current;
    if (!header) return;
    this.cursor.advance();

    let line = this.cursor.current;
    while (line && line.indent > header.indent) {
      const content = line.content;
      const nested = Object.keys(handlers).find((name) => content.startsWith(name));
      if (nested) {
        handlers[nested]();
      } else {
        onField(content);
        this.cursor.advance();
      }
      line = this.cursor.current;
    }
  }

  private parseDevice(): DeviceDraft {
    const draft: DeviceDraft = { descriptor: createDeviceDescriptor(), configurations: [] };
    this.section(
      { [CONFIGURATION]: () => draft.configurations.push(this.parseConfiguration()) },
      (content) => applyField(DEVICE_FIELDS, draft.descriptor, content)
    );
    log.debug(
      `device ${draft.descriptor.vendorId.toString(16)}:${draft.descriptor.productId.toString(16)}` +
        ` with ${draft.configurations.length} configuration(s)`
    );
    return draft;
  }

  private parseConfiguration(): ConfigurationDraft {
    const config = createConfiguration();
    this.section(
      { [INTERFACE]: () => config.interfaces.push(this.parseInterface(config)) },
      (content) => applyField(CONFIGURATION_FIELDS, config, content)
    );

    config.uacVersion = config.audioControl?.header?.uacVersion ?? UacVersion.UNKNOWN;
    config.alternateSettings = this.buildAlternateSettings(config);
    return config;
  }

  private parseInterface(config: ConfigurationDraft): InterfaceDraft {
    const iface = createInterface();
    // Format type descriptors attach to the latest AS general of this interface
    let streaming: Draft<AudioStreamingInterface> | null = null;

    this.section(
      {
        [ENDPOINT]: () => iface.endpoints.push(this.parseEndpoint()),
        // Some lsusb builds print the class endpoint beside its endpoint
        [AS_ENDPOINT]: () => this.parseAudioEndpoint(iface.endpoints[iface.endpoints.length - 1]),
        [AUDIO_CONTROL]: () => this.parseAudioControl(config, iface),
        [AUDIO_STREAMING]: () => {
          streaming = this.parseAudioStreaming(config, iface, streaming);
        },
      },
      (content) => applyField(INTERFACE_FIELDS, iface, content)
    );
    return iface;
  }

  private parseEndpoint(): Draft<EndpointDescriptor> {
    const endpoint = createEndpoint();
    const audioEndpoint = (): void => this.parseAudioEndpoint(endpoint);

    this.section(
      { [AS_ENDPOINT]: audioEndpoint, [AC_ENDPOINT]: audioEndpoint },
      (content) => applyField(ENDPOINT_FIELDS, endpoint, content)
    );
    return endpoint;
  }

  private parseAudioEndpoint(endpoint: Draft<EndpointDescriptor> | undefined): void {
    const header = this.cursor.current;
    if (!header) return;

    if (endpoint) {
      this.section({}, (content) => applyField(AUDIO_ENDPOINT_FIELDS, endpoint, content));
    } else {
      log.debug(`audio endpoint at line ${header.number} follows no endpoint`);
      this.cursor.skipBody(header.indent);
    }
  }

  private parseAudioControl(config: ConfigurationDraft, iface: InterfaceDraft): void {
    const header = this.cursor.current;
    if (!header) return;

    const lines = this.cursor.body(header.indent);
    const subtype = subtypeOf(lines);
    const dialect = dialectOf(config.audioControl, iface.interfaceProtocol);
    const descriptor = acDescriptorFor(dialect, subtype);

    if (descriptor) {
      const ac = config.audioControl ?? createAudioControl();
      config.audioControl = ac;
      readAudioControl(ac, descriptor, lines, dialect, iface.interfaceProtocol);
    } else {
      log.debug(`skipping AudioControl subtype ${subtype} (UAC ${dialect}) at line ${header.number}`);
    }
    this.cursor.skipBody(header.indent);
  }

  private parseAudioStreaming(
    config: ConfigurationDraft,
    iface: InterfaceDraft,
    latest: Draft<AudioStreamingInterface> | null
  ): Draft<AudioStreamingInterface> | null {
    const header = this.cursor.current;
    if (!header) return latest;

    const lines = this.cursor.body(header.indent);
    const subtype = subtypeOf(lines);
    let result = latest;

    switch (asDescriptorFor(subtype)) {
      case "general": {
        const streaming = readGeneral(lines, iface.interfaceNumber, iface.alternateSetting);
        config.streamingInterfaces.push(streaming);
        result = streaming;
        break;
      }
      case "format_type": {
        const format = readFormatType(lines, latest);
        if (latest) {
          latest.format = format;
        } else {
          log.debug(`format type at line ${header.number} has no AS general descriptor`);
        }
        break;
      }
      default:
        log.debug(`skipping AudioStreaming subtype ${subtype} at line ${header.number}`);
    }

    this.cursor.skipBody(header.indent);
    return result;
  }

  /**
   * One record per AudioStreaming interface alternate setting, ordered by
   * (interface number, alternate setting)
   */
  private buildAlternateSettings(config: ConfigurationDraft): AlternateSetting[] {
    const settings: AlternateSetting[] = [];

    for (const iface of config.interfaces) {
      const streaming =
        config.streamingInterfaces.find(
          (s) =>
            s.interfaceNumber === iface.interfaceNumber &&
            s.alternateSetting === iface.alternateSetting
        ) ?? null;
      if (!streaming && !isStreamingInterface(iface)) continue;

      const endpoint = dataEndpoint(iface);
      if (streaming) streaming.endpoint = endpoint;

      settings.push({
        interfaceNumber: iface.interfaceNumber,
        alternateSetting: iface.alternateSetting,
        streamingInterface: streaming,
        format: streaming?.format ?? null,
        endpoint,
      });
    }

    return settings.sort(
      (a, b) =>
        a.interfaceNumber - b.interfaceNumber || a.alternateSetting - b.alternateSetting
    );
  }
}
