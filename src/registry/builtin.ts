import { z } from 'zod';

import { countSentences, listWords } from '../lib/text.js';

import type { ToolDescriptor } from './registry.js';
import { toolError, toolValue } from './registry.js';

type TemperatureUnit = 'C' | 'F' | 'K';

const UNIT_ALIASES = new Map<string, TemperatureUnit>([
  ['c', 'C'],
  ['celsius', 'C'],
  ['f', 'F'],
  ['fahrenheit', 'F'],
  ['k', 'K'],
  ['kelvin', 'K'],
]);

const TO_CELSIUS: Record<TemperatureUnit, (value: number) => number> = {
  C: (value) => value,
  F: (value) => ((value - 32) * 5) / 9,
  K: (value) => value - 273.15,
};

const FROM_CELSIUS: Record<TemperatureUnit, (value: number) => number> = {
  C: (value) => value,
  F: (value) => (value * 9) / 5 + 32,
  K: (value) => value + 273.15,
};

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function numberSchema(message: string) {
  return z.coerce.number({ error: message });
}

const textSchema = z
  .string({ error: 'Provide the text to analyze' })
  .min(1, { error: 'Text must not be empty' });

const temperatureValueSchema = numberSchema('Temperature must be a number');

const temperatureUnitSchema = z
  .string({ error: 'Unit must be text' })
  .transform((raw, ctx) => {
    const unit = UNIT_ALIASES.get(raw.trim().toLowerCase());
    if (unit === undefined) {
      ctx.addIssue({
        code: 'custom',
        message: 'Unknown unit; use Celsius/C, Fahrenheit/F or Kelvin/K',
      });
      return z.NEVER;
    }
    return unit;
  });

const amountSchema = numberSchema('Amount must be a number').positive({
  error: 'Amount must be greater than zero',
});

const percentSchema = numberSchema('Rate must be a number').min(0, {
  error: 'Rate cannot be negative',
});

const yearsSchema = numberSchema('Years must be a number').positive({
  error: 'Years must be greater than zero',
});

const compoundsSchema = numberSchema('Compounding periods must be a number')
  .int({ error: 'Compounding periods must be a whole number' })
  .positive({ error: 'Compounding periods must be greater than zero' });

const analyzeTextInput = z.object({ text: textSchema });

const convertTemperatureInput = z.object({
  value: temperatureValueSchema,
  from_unit: temperatureUnitSchema,
  to_unit: temperatureUnitSchema,
});

const mortgageInput = z.object({
  principal: amountSchema,
  annual_rate: percentSchema,
  years: yearsSchema.int({ error: 'Years must be a whole number' }),
});

const compoundInterestInput = z.object({
  principal: amountSchema,
  rate: percentSchema,
  time: yearsSchema,
  compounds_per_year: compoundsSchema.optional(),
});

function firstIssue(error: z.ZodError): string {
  return error.issues[0]?.message ?? 'Invalid parameters';
}

export function convertTemperature(
  value: number,
  from: TemperatureUnit,
  to: TemperatureUnit
): number {
  return round2(FROM_CELSIUS[to](TO_CELSIUS[from](value)));
}

export function calculateMortgage(
  principal: number,
  annualRatePercent: number,
  years: number
): { monthly_payment: number; total_payment: number; total_interest: number } {
  const monthlyRate = annualRatePercent / 100 / 12;
  const payments = years * 12;
  const monthly =
    monthlyRate === 0
      ? principal / payments
      : (principal * (monthlyRate * (1 + monthlyRate) ** payments)) /
        ((1 + monthlyRate) ** payments - 1);
  const total = monthly * payments;
  return {
    monthly_payment: round2(monthly),
    total_payment: round2(total),
    total_interest: round2(total - principal),
  };
}

/** Rates above 1 are read as percentages (5 means 5%). */
export function calculateCompoundInterest(
  principal: number,
  rate: number,
  time: number,
  compoundsPerYear = 12
): { final_amount: number; interest_earned: number; input_rate_percent: number } {
  const decimalRate = rate > 1 ? rate / 100 : rate;
  const finalAmount =
    principal * (1 + decimalRate / compoundsPerYear) ** (compoundsPerYear * time);
  return {
    final_amount: round2(finalAmount),
    interest_earned: round2(finalAmount - principal),
    input_rate_percent: round2(decimalRate * 100),
  };
}

export function analyzeText(text: string): {
  word_count: number;
  char_count: number;
  avg_word_length: number;
  sentence_count: number;
} {
  const words = listWords(text);
  const letters = words.reduce((sum, word) => sum + word.length, 0);
  return {
    word_count: words.length,
    char_count: text.length,
    avg_word_length: round2(letters / Math.max(words.length, 1)),
    sentence_count: countSentences(text),
  };
}

const analyzeTextTool: ToolDescriptor = {
  name: 'analyze_text',
  description: 'Analyze text and return word, character and sentence statistics',
  usage: '{"tool": "analyze_text", "arguments": {"text": "This is a sample."}}',
  parameters: [
    {
      name: 'text',
      description: 'Text to analyze',
      question: 'What text should I analyze?',
      schema: textSchema,
    },
  ],
  invoke(params) {
    const parsed = analyzeTextInput.safeParse(params);
    if (!parsed.success) {
      return toolError('invalid_parameters', firstIssue(parsed.error));
    }
    return toolValue(analyzeText(parsed.data.text));
  },
};

const convertTemperatureTool: ToolDescriptor = {
  name: 'convert_temperature',
  description: 'Convert temperature between Celsius, Fahrenheit and Kelvin',
  usage:
    '{"tool": "convert_temperature", "arguments": {"value": 32, "from_unit": "F", "to_unit": "C"}}',
  parameters: [
    {
      name: 'value',
      description: 'Temperature to convert',
      question: 'Which temperature should I convert?',
      schema: temperatureValueSchema,
      guidance: 'Enter a plain number, for example 32 or -4.5.',
    },
    {
      name: 'from_unit',
      description: 'Source unit (C, F, K)',
      question: 'Which unit is that temperature in (C, F or K)?',
      schema: temperatureUnitSchema,
    },
    {
      name: 'to_unit',
      description: 'Target unit (C, F, K)',
      question: 'Which unit should I convert to (C, F or K)?',
      schema: temperatureUnitSchema,
    },
  ],
  invoke(params) {
    const parsed = convertTemperatureInput.safeParse(params);
    if (!parsed.success) {
      return toolError('invalid_parameters', firstIssue(parsed.error));
    }
    const { value, from_unit, to_unit } = parsed.data;
    return toolValue({
      value: convertTemperature(value, from_unit, to_unit),
      unit: to_unit,
    });
  },
};

const calculateMortgageTool: ToolDescriptor = {
  name: 'calculate_mortgage',
  description: 'Calculate monthly mortgage payments and total costs',
  usage:
    '{"tool": "calculate_mortgage", "arguments": {"principal": 300000, "annual_rate": 3.5, "years": 30}}',
  parameters: [
    {
      name: 'principal',
      description: 'Loan amount',
      question: 'How much is the loan?',
      schema: amountSchema,
      guidance: 'Enter the amount as a number without currency symbols, e.g. 250000.',
    },
    {
      name: 'annual_rate',
      description: 'Annual interest rate as a percentage',
      question: 'What is the annual interest rate (in percent)?',
      schema: percentSchema,
      guidance: 'Enter the rate as a percentage, e.g. 3.5 for 3.5%.',
    },
    {
      name: 'years',
      description: 'Loan term in years',
      question: 'Over how many years?',
      schema: yearsSchema.int({ error: 'Years must be a whole number' }),
    },
  ],
  invoke(params) {
    const parsed = mortgageInput.safeParse(params);
    if (!parsed.success) {
      return toolError('invalid_parameters', firstIssue(parsed.error));
    }
    const { principal, annual_rate, years } = parsed.data;
    return toolValue(calculateMortgage(principal, annual_rate, years));
  },
};

const calculateCompoundInterestTool: ToolDescriptor = {
  name: 'calculate_compound_interest',
  description: 'Calculate compound interest for an investment',
  usage:
    '{"tool": "calculate_compound_interest", "arguments": {"principal": 10000, "rate": 0.05, "time": 10, "compounds_per_year": 12}}',
  parameters: [
    {
      name: 'principal',
      description: 'Initial investment',
      question: 'How much are you investing?',
      schema: amountSchema,
    },
    {
      name: 'rate',
      description: 'Annual rate, as a decimal (0.05) or a percentage (5)',
      question: 'What is the annual interest rate?',
      schema: percentSchema,
      guidance: 'Enter 0.05 or 5 for five percent.',
    },
    {
      name: 'time',
      description: 'Investment period in years',
      question: 'For how many years?',
      schema: yearsSchema,
    },
    {
      name: 'compounds_per_year',
      description: 'Compounding periods per year (default 12)',
      question: 'How many times per year is interest compounded?',
      schema: compoundsSchema,
      required: false,
    },
  ],
  invoke(params) {
    const parsed = compoundInterestInput.safeParse(params);
    if (!parsed.success) {
      return toolError('invalid_parameters', firstIssue(parsed.error));
    }
    const { principal, rate, time, compounds_per_year } = parsed.data;
    return toolValue(
      calculateCompoundInterest(principal, rate, time, compounds_per_year)
    );
  },
};

export const BUILTIN_TOOLS: readonly ToolDescriptor[] = [
  analyzeTextTool,
  convertTemperatureTool,
  calculateMortgageTool,
  calculateCompoundInterestTool,
];
