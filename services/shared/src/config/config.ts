import { readFileSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';
import { DECISION_OUTCOMES, FLAG_REASONS, JOB_NAMES, QUARANTINE } from '../types/inventory.types';
import { ValidationError, describeError } from '../utils/errors';

export interface CategoryScoped<T> {
     default: T;
     categories: Record<string, Partial<T>>;
}

/**
 * Category override merged over the defaults; keys the override leaves out
 * keep their default value.
 */
export function resolveForCategory<T extends object>(scoped: CategoryScoped<T>, category: string): T {
     const override = scoped.categories[category];
     if (!override) {
          return scoped.default;
     }
     const defined = Object.fromEntries(Object.entries(override).filter(([, value]) => value !== undefined));
     return { ...scoped.default, ...defined };
}

function categoryScoped<T extends z.ZodRawShape>(shape: T) {
     const settings = z.object(shape);
     return z.object({
          default: settings,
          categories: z.record(z.string(), settings.partial()).default({}),
     });
}

const velocityProfileShape = {
     unitsPerRun: z.number().int().nonnegative(),
     jitterPct: z.number().min(0).max(1).default(0),
};

const returnsShape = {
     fraction: z.number().min(0).max(1),
     capacityCeiling: z.number().int().nonnegative(),
};

const shrinkShape = {
     shrinkRate: z.number().min(0).max(1),
};

const receivingShape = {
     parLevel: z.number().int().nonnegative(),
     shelfLifeDays: z.number().int().positive(),
};

const thresholdShape = {
     expiryThresholdDays: z.number().int().nonnegative(),
     minUnitsThreshold: z.number().nonnegative(),
     maxDaysOfSupply: z.number().positive(),
};

const simulationSchema = z.object({
     seed: z.number().int().default(42),
     retryDelayMinutes: z.number().positive().default(5),
     intervals: z
          .record(z.enum(JOB_NAMES), z.number().positive())
          .refine((intervals) => Object.keys(intervals).length > 0, {
               message: 'at least one job interval is required',
          }),
     sellDown: categoryScoped(velocityProfileShape),
     returns: categoryScoped(returnsShape),
     shrink: categoryScoped(shrinkShape),
     receiving: categoryScoped(receivingShape),
});

const detectionSchema = z.object({
     windowDays: z.number().int().positive().default(7),
     thresholds: categoryScoped(thresholdShape),
});

const integrationSchema = z.object({
     intervalMinutes: z.number().positive().default(10),
     quarantineLocations: z
          .array(z.string().min(1))
          .refine((locations) => locations.includes(QUARANTINE), {
               message: `must include "${QUARANTINE}", where recalls move stock`,
          })
          .default([QUARANTINE]),
     recordFlagEvents: z.boolean().default(true),
});

export const appConfigSchema = z.object({
     simulation: simulationSchema,
     detection: detectionSchema,
     integration: integrationSchema.default({}),
});

const markdownSchema = z
     .object({
          basePct: z.number().min(0).max(100),
          incrementPct: z.number().min(0).default(0),
          maxPct: z.number().min(0).max(100),
     })
     .refine((markdown) => markdown.basePct <= markdown.maxPct, {
          message: 'basePct must not exceed maxPct',
     });

const suggestedQtySchema = z.discriminatedUnion('kind', [
     z.object({ kind: z.literal('on_hand') }),
     z.object({ kind: z.literal('excess_supply') }),
     z.object({ kind: z.literal('fixed'), quantity: z.number().int().nonnegative() }),
]);

const ruleSchema = z
     .object({
          reason: z.enum(FLAG_REASONS),
          outcome: z.enum(DECISION_OUTCOMES),
          categories: z.array(z.string().min(1)).min(1).optional(),
          excludeCategories: z.array(z.string().min(1)).min(1).optional(),
          perishable: z.boolean().optional(),
          markdown: markdownSchema.optional(),
          suggestedQty: suggestedQtySchema.default({ kind: 'on_hand' }),
          notes: z.string().default(''),
     })
     .refine((rule) => rule.outcome !== 'MARKDOWN' || rule.markdown !== undefined, {
          message: 'MARKDOWN rules need a markdown formula',
          path: ['markdown'],
     });

export const policyConfigSchema = z.object({
     rules: z.array(ruleSchema),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type SimulationConfig = AppConfig['simulation'];
export type DetectionConfig = AppConfig['detection'];
export type IntegrationConfig = AppConfig['integration'];
export type PolicyConfig = z.infer<typeof policyConfigSchema>;
export type RuleConfig = PolicyConfig['rules'][number];
export type VelocityProfile = SimulationConfig['sellDown']['default'];
export type ReturnsSettings = SimulationConfig['returns']['default'];
export type ShrinkSettings = SimulationConfig['shrink']['default'];
export type ReceivingSettings = SimulationConfig['receiving']['default'];
export type DetectionThresholds = DetectionConfig['thresholds']['default'];

function parseWith<T extends z.ZodTypeAny>(schema: T, raw: unknown, source: string): z.output<T> {
     const result = schema.safeParse(raw);
     if (!result.success) {
          const issues = result.error.issues.map(
               (issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`
          );
          throw new ValidationError(`Invalid configuration in ${source}`, issues);
     }
     return result.data;
}

export function parseAppConfig(raw: unknown, source: string = 'app config'): AppConfig {
     return parseWith(appConfigSchema, raw, source);
}

export function parsePolicyConfig(raw: unknown, source: string = 'decision policy'): PolicyConfig {
     return parseWith(policyConfigSchema, raw, source);
}

export function readJsonFile(path: string): unknown {
     let text: string;
     try {
          text = readFileSync(path, 'utf-8');
     } catch (error) {
          throw new ValidationError(`Cannot read configuration file ${path}`, [describeError(error)]);
     }
     try {
          return JSON.parse(text);
     } catch (error) {
          throw new ValidationError(`Configuration file ${path} is not valid JSON`, [describeError(error)]);
     }
}

export interface ConfigProvider {
     simulation(): SimulationConfig;
     detection(): DetectionConfig;
     integration(): IntegrationConfig;
     policy(): PolicyConfig;
}

export class StaticConfigProvider implements ConfigProvider {
     constructor(
          private readonly app: AppConfig,
          private readonly rules: PolicyConfig
     ) {}

     simulation(): SimulationConfig {
          return this.app.simulation;
     }

     detection(): DetectionConfig {
          return this.app.detection;
     }

     integration(): IntegrationConfig {
          return this.app.integration;
     }

     policy(): PolicyConfig {
          return this.rules;
     }
}

/**
 * Reads and validates both configuration files once; any problem is a
 * ValidationError and the process must not start.
 */
export function loadConfigProvider(
     configPath: string = process.env.CONFIG_PATH || 'config/stockwatch.json',
     policyPath: string = process.env.POLICY_PATH || 'config/decision-policy.json'
): ConfigProvider {
     const appFile = resolve(configPath);
     const policyFile = resolve(policyPath);
     return new StaticConfigProvider(
          parseAppConfig(readJsonFile(appFile), appFile),
          parsePolicyConfig(readJsonFile(policyFile), policyFile)
     );
}
