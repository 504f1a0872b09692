import { PromptPreset } from './types';

export const DEFAULT_PRESET = 'general';

export const PROMPT_PRESETS: Record<string, PromptPreset> = {
  size_chart: {
    description: 'Extract size chart measurements as structured JSON',
    prompt: [
      'Read the size chart in this image and return JSON with two fields:',
      '"sizes", every size label in the order shown, and "measurements", an object',
      'keyed by measurement name whose values map each size to its value.',
      'Use only values visible in the image and keep their units.',
    ].join(' '),
  },
  invoice: {
    description: 'Extract invoice data including items, totals, vendor info',
    prompt: [
      'Return the invoice in this image as JSON with "vendor", "date" (YYYY-MM-DD),',
      '"invoice_number", "items" (each with "description", "quantity", "price"),',
      '"subtotal", "tax" and "total".',
    ].join(' '),
  },
  receipt: {
    description: 'Extract receipt data including items and totals',
    prompt: [
      'Return the receipt in this image as JSON with "store", "date" (YYYY-MM-DD),',
      '"items" (each with "name" and "price"), "subtotal", "tax", "total"',
      'and "payment_method".',
    ].join(' '),
  },
  business_card: {
    description: 'Extract contact information from business cards',
    prompt: [
      'Return the contact details on this business card as JSON with "name",',
      '"title", "company", "email", "phone", "address" and "website".',
    ].join(' '),
  },
  table: {
    description: 'Extract tabular data with headers and rows',
    prompt: [
      'Return the table in this image as JSON with "headers", a list of column names,',
      'and "rows", a list of rows of cell values.',
    ].join(' '),
  },
  general: {
    description: 'General purpose extraction and description',
    prompt: [
      'Extract all text in this image, describe what it shows',
      'and list any structured data you can identify.',
    ].join(' '),
  },
};
