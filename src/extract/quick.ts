/**
 * tbforge — Offline spec extraction.
 * Pattern-based reading of a short description, for when no language model is
 * configured. Produces the same candidate shape a model would.
 */

import type { CandidateInput, SpecExtractor } from './candidate.js';

const REGISTER_PATTERN =
  /(\w+)\s+(?:register\s+)?(?:at\s+|@\s*|\()(0x[0-9a-f]+|\d+)\)?(?:\s*[(,]\s*(RO|RW|WO|W1C|W1S|read[- ]?only|read[- ]?write|write[- ]?only))?/gi;

const STOPWORDS = new Set(['register', 'registers', 'and', 'with', 'a', 'an', 'the', 'is', 'located', 'mapped']);

/** "UART at 115200 baud" names the bus, not a register */
const PROTOCOL_WORD = /^(?:apb[234]?|axi4?|axi4?lite|uart|spi|qspi|i2c|iic|serial)$/i;

function detectProtocol(lower: string): string {
  if (/axi4[- ]?lite|axi[- ]lite/.test(lower)) return 'axi4lite';
  if (/\baxi4?\b/.test(lower)) return 'axi4lite';
  if (/\buart\b|\brs-?232\b/.test(lower)) return 'uart';
  if (/\bspi\b|serial peripheral/.test(lower)) return 'spi';
  if (/\bi2c\b|\biic\b/.test(lower)) return 'i2c';
  if (/\bserial\b/.test(lower)) return 'uart';
  const apb = lower.match(/\bapb([234])\b/);
  if (apb) return `apb${apb[1]}`;
  return 'apb';
}

function parseAddress(text: string): number {
  const t = text.toLowerCase();
  return t.startsWith('0x') ? Number.parseInt(t.slice(2), 16) : Number.parseInt(t, 10);
}

function accessCode(text: string | undefined): string | undefined {
  if (!text) return undefined;
  const t = text.toUpperCase().replace(/[- ]/g, '');
  if (t === 'READONLY') return 'RO';
  if (t === 'WRITEONLY') return 'WO';
  if (t === 'READWRITE') return 'RW';
  return t;
}

/** Read a description into a candidate without a model */
export function quickExtract(text: string): CandidateInput {
  const lower = text.toLowerCase();
  const protocol = detectProtocol(lower);
  const candidate: CandidateInput = { protocol };

  const name = lower.match(/(?:\bfor|\bnamed?)\s+["']?([a-z_]\w*)["']?/);
  candidate.module_name = name && !STOPWORDS.has(name[1]) ? name[1] : `${protocol.replace(/[234]$/, '')}_dut`;

  const width = lower.match(/(\d+)\s*-?\s*bits?\b(?!\s*(?:addr|address|data\s+bits?))/);
  if (width) candidate.data_width = Number.parseInt(width[1], 10);

  const addrWidth = lower.match(/(\d+)\s*-?\s*bits?\s+addr(?:ess)?\b/);
  if (addrWidth && protocol !== 'i2c') candidate.addr_width = Number.parseInt(addrWidth[1], 10);

  const registers: Array<{ name: string; address: number; access?: string }> = [];
  for (const m of text.matchAll(REGISTER_PATTERN)) {
    if (STOPWORDS.has(m[1].toLowerCase()) || PROTOCOL_WORD.test(m[1])) continue;
    const access = accessCode(m[3]);
    registers.push({ name: m[1].toUpperCase(), address: parseAddress(m[2]), ...(access ? { access } : {}) });
  }
  candidate.registers = registers;

  if (protocol === 'uart') {
    const baud = lower.match(/(\d+)\s*baud|baud(?:\s*rate)?\s*(?:of|=|:)?\s*(\d+)/);
    if (baud) candidate.baud_rate = Number.parseInt(baud[1] ?? baud[2], 10);
    const parity = lower.match(/\b(even|odd|mark|space)\s+parity|parity\s*(?:=|:)?\s*(none|even|odd|mark|space)\b/);
    if (parity) candidate.parity = parity[1] ?? parity[2];
    else if (/\bno\s+parity\b/.test(lower)) candidate.parity = 'none';
    const dataBits = lower.match(/\b([5-9])\s*-?\s*data\s*bits?\b/);
    if (dataBits) candidate.data_bits = Number.parseInt(dataBits[1], 10);
    const stopBits = lower.match(/\b(1\.5|1|2)\s*-?\s*stop\s*bits?\b/);
    if (stopBits) candidate.stop_bits = Number.parseFloat(stopBits[1]);
    if (/\brts\b|\bcts\b|flow control/.test(lower)) candidate.has_rts_cts = true;
    if (/\bfifo\b/.test(lower)) candidate.has_fifo = true;
  }

  if (protocol === 'spi') {
    const mode = lower.match(/\bmode\s*([0-3])\b/);
    if (mode) candidate.spi_mode = Number.parseInt(mode[1], 10);
    const slaves = lower.match(/(\d+)\s+(?:slaves?|chip[- ]selects?)/);
    if (slaves) candidate.spi_num_slaves = Number.parseInt(slaves[1], 10);
    if (/\blsb[- ]first\b/.test(lower)) candidate.spi_msb_first = false;
    if (/\bqspi\b|\bquad\b/.test(lower)) candidate.spi_supports_qspi = true;
  }

  if (protocol === 'i2c') {
    const bits = lower.match(/\b(7|10)\s*-?\s*bit\s+addr/);
    if (bits) candidate.i2c_address_bits = Number.parseInt(bits[1], 10);
    if (/high[- ]speed/.test(lower)) candidate.i2c_speed_mode = 'high-speed';
    else if (/fast[- ]?(?:mode)?[- ]?plus|fast\+/.test(lower)) candidate.i2c_speed_mode = 'fast-plus';
    else if (/\bfast\b/.test(lower)) candidate.i2c_speed_mode = 'fast';
    if (/multi[- ]master/.test(lower)) candidate.i2c_multi_master = true;
    const device = lower.match(/(?:device|slave)\s+address\s*(?:of|=|:)?\s*(0x[0-9a-f]+|\d+)/);
    if (device) candidate.device_address = parseAddress(device[1]);
  }

  return candidate;
}

/** SpecExtractor backed by quickExtract */
export const quickExtractor: SpecExtractor = {
  extract: text => Promise.resolve(quickExtract(text)),
};
