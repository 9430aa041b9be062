import { VC_LIST_FIELDS, isNoInfo, type SimilarFirm, type VcRecord } from '@vc-scout/shared';

export function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1).toLowerCase();
}

/**
 * Human-readable summary of a record, one line per field in canonical order
 */
export function formatVcRecord(record: VcRecord, url: string): string {
  let summary = 'The information from the URL is the following: \n';
  summary += `- ${capitalize('vc_name')}: ${record.vc_name}\n`;

  for (const field of VC_LIST_FIELDS) {
    const values = record[field];
    const label = capitalize(field);
    if (isNoInfo(values)) {
      summary += `- There is not much information available about ${label}. You can check it manually by visiting the website: ${url}\n`;
    } else {
      summary += `- ${label}: ${values.join(', ')}\n`;
    }
  }

  return summary;
}

export function buildProcessMessage(summary: string, similar: SimilarFirm[]): string {
  const names = similar.map((firm) => firm.vcName).join(', ');
  return `Message: ${summary} \n Similar companies: ${names}`;
}
