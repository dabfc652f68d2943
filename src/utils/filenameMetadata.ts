import type { FilenameMetadata } from '../types/index.js';

// YYYYMMDD_HHMMSS<min>m<sec>s_PHONE_STATUS_AGENT.ext
const FILENAME_PATTERN = /^(\d{4})(\d{2})(\d{2})_(\d{2})(\d{2})(\d{2})(\d+)m(\d+)s_([^_]+)_([^_]+)_(.+)\./;

/**
 * Pull dialler metadata out of a recording filename. Fields are left unset
 * when the name doesn't follow the pattern or encodes an impossible date.
 */
export function parseFilenameMetadata(filename: string): FilenameMetadata {
  const empty: FilenameMetadata = { estimatedDurationSeconds: 0 };
  const match = FILENAME_PATTERN.exec(filename);
  if (!match) {
    return empty;
  }

  const [, year, month, day, hour, minute, second, durMin, durSec, phone, status, agent] = match;
  if (!year || !month || !day || !hour || !minute || !second || !durMin || !durSec) {
    return empty;
  }

  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  if (
    date.getUTCFullYear() !== Number(year) ||
    date.getUTCMonth() !== Number(month) - 1 ||
    date.getUTCDate() !== Number(day) ||
    Number(hour) > 23 ||
    Number(minute) > 59 ||
    Number(second) > 59
  ) {
    return empty;
  }

  const callDate = `${year}-${month}-${day}`;
  const callTime = `${hour}:${minute}:${second}`;

  return {
    callDate,
    callTime,
    callDatetime: `${callDate}T${callTime}`,
    phoneNumber: phone,
    callStatus: status,
    agentName: agent,
    estimatedDurationSeconds: Number(durMin) * 60 + Number(durSec),
  };
}
