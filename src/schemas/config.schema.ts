import { z } from 'zod';

export const infobloxConnectionSchema = z.object({
  host: z.string().min(1, 'Infoblox host is required'),
  port: z.number().int().min(1).max(65535).default(443),
  view: z.string().min(1).default('default'),
  wapiVersion: z
    .union([z.string(), z.number()])
    .transform((v) => String(v))
    .pipe(z.string().regex(/^\d+(\.\d+)*$/, 'WAPI version must look like 2.10'))
    .default('2.10'),
  username: z.string().min(1).optional(),
  password: z.string().min(1).optional(),
  pageSize: z.number().int().min(1).max(10000).default(1000),
});

export const nameserverSchema = z.object({
  hostname: z.string().min(1, 'hostname is required'),
  group: z.string().min(1).optional(),
  groups: z.array(z.string().min(1)).default([]),
  // Checked by the renderer so an unknown dialect only fails its own nameserver
  format: z.string().min(1, 'format is required'),
  path: z.string().min(1, 'path is required'),
  outputFile: z.string().min(1, 'outputFile is required'),
  master: z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]),
  tsigKey: z.string().min(1).optional(),
  discoverGroups: z.boolean().default(false),
});

export const runConfigSchema = z
  .object({
    infoblox: infobloxConnectionSchema,
    nameserver: nameserverSchema.optional(),
    nameservers: z.record(z.string(), nameserverSchema).optional(),
  })
  .superRefine((config, ctx) => {
    const single = config.nameserver !== undefined;
    const multiple = config.nameservers !== undefined;
    if (single === multiple) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'exactly one of "nameserver" or "nameservers" must be set',
      });
    } else if (multiple && Object.keys(config.nameservers ?? {}).length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['nameservers'],
        message: 'at least one nameserver is required',
      });
    }
  });

export type InfobloxConnectionSchema = z.infer<typeof infobloxConnectionSchema>;
export type NameserverSchema = z.infer<typeof nameserverSchema>;
export type RunConfigSchema = z.infer<typeof runConfigSchema>;
