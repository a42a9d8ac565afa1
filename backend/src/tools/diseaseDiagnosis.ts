import { open, stat } from 'node:fs/promises';
import { isAbsolute, relative, resolve } from 'node:path';
import { z } from 'zod';
import type { ToolDefinition } from '../../../shared/types.js';
import type { ChatCompletionClient } from '../openai/openaiClient.js';
import { describeError } from '../utils/errors.js';
import { toolFailure, type ToolResponse } from './types.js';

export const DIAGNOSIS_TOOL_NAME = 'diagnose_crop_disease' as const;

export const diseaseDiagnosisDefinition = {
  name: DIAGNOSIS_TOOL_NAME,
  description:
    'Diagnoses crop diseases and pests from a photo of the affected plant and recommends affordable, ' +
    'locally available treatments. Only call it when the farmer has uploaded an image; ' +
    'if they describe symptoms without a photo, ask them to upload one.',
  parameters: {
    image_path: {
      type: 'string',
      description: 'Path of the uploaded crop image, exactly as given in the conversation.',
      required: true
    },
    additional_context: {
      type: 'string',
      description: "What the farmer observed, e.g. 'leaves turning yellow since last week'.",
      required: false
    },
    language: {
      type: 'string',
      description: "Language for the diagnosis, e.g. 'english', 'hindi', 'kannada'. Defaults to english.",
      required: false
    }
  }
} satisfies ToolDefinition;

export const diseaseDiagnosisArgs = z
  .object({
    image_path: z.string().min(1),
    additional_context: z.string().optional(),
    language: z.string().optional()
  })
  .strict();

export type DiseaseDiagnosisArgs = z.infer<typeof diseaseDiagnosisArgs>;

const treatmentSchema = z
  .object({
    name: z.string(),
    type: z.string(),
    ingredients: z.array(z.string()),
    application: z.string(),
    frequency: z.string(),
    cost_estimate: z.string(),
    availability: z.string()
  })
  .partial();

const diagnosisSchema = z
  .object({
    crop_type: z.string(),
    disease_name: z.string(),
    confidence: z.string(),
    symptoms: z.array(z.string()),
    causes: z.array(z.string()),
    treatments: z.array(treatmentSchema),
    preventive_measures: z.array(z.string()),
    severity: z.string(),
    additional_notes: z.string()
  })
  .partial();

export type Diagnosis = z.infer<typeof diagnosisSchema>;

export interface DiagnosisData {
  imagePath: string;
  diagnosis: Diagnosis | null;
  rawDiagnosis: string | null;
  summary: string;
}

export type ImageFormat = 'jpeg' | 'png' | 'webp';

export interface DiseaseDiagnosisOptions {
  model: string;
  uploadDir: string;
  maxImageBytes: number;
}

const SYSTEM_PROMPT = `You are an expert agricultural pathologist specializing in crop diseases in India.
Analyze plant images and give accurate, actionable diagnoses and treatment recommendations.

Instructions:
1. Identify the crop first.
2. Name the disease or pest clearly.
3. Prefer treatments that are affordable and available in Indian villages; suggest organic remedies where they work.
4. Give immediate and long-term measures with quantities and application methods.
5. Rate severity as Mild, Moderate, Severe or Critical.

Respond with JSON only:
{
  "crop_type": "name of the crop",
  "disease_name": "specific disease or pest",
  "confidence": "high/medium/low",
  "symptoms": ["..."],
  "causes": ["..."],
  "treatments": [
    {
      "name": "treatment name",
      "type": "organic/chemical/cultural",
      "ingredients": ["..."],
      "application": "how to apply",
      "frequency": "how often",
      "cost_estimate": "approximate cost in INR",
      "availability": "where to buy in rural areas"
    }
  ],
  "preventive_measures": ["..."],
  "severity": "Mild/Moderate/Severe/Critical",
  "additional_notes": "anything else important"
}`;

/** Identifies JPEG, PNG and WEBP by their leading bytes. */
export function detectImageFormat(header: Uint8Array): ImageFormat | null {
  if (header.length >= 3 && header[0] === 0xff && header[1] === 0xd8 && header[2] === 0xff) {
    return 'jpeg';
  }
  const png = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];
  if (header.length >= png.length && png.every((byte, index) => header[index] === byte)) {
    return 'png';
  }
  const ascii = (start: number, end: number) => String.fromCharCode(...header.subarray(start, end));
  if (header.length >= 12 && ascii(0, 4) === 'RIFF' && ascii(8, 12) === 'WEBP') {
    return 'webp';
  }
  return null;
}

function stripCodeFence(text: string): string {
  const fenced = /^```(?:json)?\s*([\s\S]*?)\s*```$/i.exec(text.trim());
  return fenced ? fenced[1] : text.trim();
}

export function parseDiagnosis(text: string): Diagnosis | null {
  let raw: unknown;
  try {
    raw = JSON.parse(stripCodeFence(text));
  } catch {
    return null;
  }
  const parsed = diagnosisSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

export function formatDiagnosisSummary(diagnosis: Diagnosis): string {
  const lines = [
    `CROP: ${diagnosis.crop_type ?? 'Unknown'}`,
    `DISEASE: ${diagnosis.disease_name ?? 'Not identified'}`,
    `CONFIDENCE: ${diagnosis.confidence ?? 'Unknown'}`,
    `SEVERITY: ${diagnosis.severity ?? 'Unknown'}`,
    '',
    'SYMPTOMS:',
    ...(diagnosis.symptoms ?? []).map((symptom) => `• ${symptom}`),
    '',
    'RECOMMENDED TREATMENTS:'
  ];

  (diagnosis.treatments ?? []).slice(0, 3).forEach((treatment, index) => {
    lines.push(
      `${index + 1}. ${treatment.name ?? 'Unknown treatment'}`,
      `   Type: ${treatment.type ?? 'N/A'}`,
      `   Application: ${treatment.application ?? 'N/A'}`,
      `   Cost: ${treatment.cost_estimate ?? 'N/A'}`
    );
  });

  return lines.join('\n');
}

/** Vision-model diagnosis of a crop photo from the upload directory. */
export class DiseaseDiagnosisTool {
  private readonly uploadDir: string;

  constructor(
    private readonly client: ChatCompletionClient,
    private readonly options: DiseaseDiagnosisOptions
  ) {
    this.uploadDir = resolve(options.uploadDir);
  }

  async diagnose(args: DiseaseDiagnosisArgs): Promise<ToolResponse<DiagnosisData>> {
    const { image_path: imagePath, additional_context: context, language = 'english' } = args;

    let image: { bytes: Buffer; format: ImageFormat };
    try {
      image = await this.readImage(imagePath);
    } catch (error) {
      return toolFailure(describeError(error), 'The crop image could not be read. Ask the farmer to upload it again.');
    }

    const userPrompt = [
      'Analyze this crop/plant image and provide a comprehensive diagnosis.',
      context ? `Additional context: ${context}` : '',
      `Provide your response in ${language}.`,
      'Focus on treatments available in Indian rural markets (local pesticide shops, organic materials, home remedies).'
    ]
      .filter(Boolean)
      .join('\n\n');

    let reply: string;
    try {
      const response = await this.client.chat.completions.create({
        model: this.options.model,
        max_tokens: 2000,
        temperature: 0.3,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          {
            role: 'user',
            content: [
              { type: 'text', text: userPrompt },
              {
                type: 'image_url',
                image_url: {
                  url: `data:image/${image.format};base64,${image.bytes.toString('base64')}`,
                  detail: 'high'
                }
              }
            ]
          }
        ]
      });
      reply = response.choices[0]?.message.content ?? '';
    } catch (error) {
      console.error('Crop diagnosis request failed:', error);
      return toolFailure(describeError(error), 'The diagnosis service is unavailable. Try again later.');
    }

    if (!reply.trim()) {
      return toolFailure('Empty diagnosis response', 'The diagnosis service returned no answer. Try again later.');
    }

    const diagnosis = parseDiagnosis(reply);
    const summary = diagnosis ? formatDiagnosisSummary(diagnosis) : reply.trim();

    return {
      success: true,
      data: {
        imagePath,
        diagnosis,
        rawDiagnosis: diagnosis ? null : reply.trim(),
        summary
      },
      message: summary
    };
  }

  private async readImage(imagePath: string): Promise<{ bytes: Buffer; format: ImageFormat }> {
    const absolute = resolve(this.uploadDir, imagePath);
    const within = relative(this.uploadDir, absolute);
    if (!within || within.startsWith('..') || isAbsolute(within)) {
      throw new Error(`Image path ${imagePath} is outside the upload directory`);
    }

    const info = await stat(absolute);
    if (!info.isFile()) {
      throw new Error(`Image path ${imagePath} is not a file`);
    }
    if (info.size > this.options.maxImageBytes) {
      throw new Error(`Image is ${info.size} bytes; the limit is ${this.options.maxImageBytes}`);
    }

    const handle = await open(absolute, 'r');
    try {
      const bytes = await handle.readFile();
      const format = detectImageFormat(bytes.subarray(0, 12));
      if (!format) {
        throw new Error('Unsupported image format; upload a JPEG, PNG or WEBP photo');
      }
      return { bytes, format };
    } finally {
      await handle.close();
    }
  }
}
