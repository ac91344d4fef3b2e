import { describe, it, expect } from 'vitest'
import {
  EXPLANATION_BLOCKED_PHRASES,
  RISK_EXPLANATION_SYSTEM_PROMPT,
  buildExplanationPrompt,
  formatScores,
  formatStack,
  isExplanationSafe,
} from '@/lib/insights/prompt'

// ── isExplanationSafe ────────────────────────────────────────────

describe('isExplanationSafe', () => {
  it('returns true for a clean explanation', () => {
    expect(
      isExplanationSafe('Zinc and calcium compete for absorption. Space them a few hours apart.')
    ).toBe(true)
  })

  it('returns true for empty string', () => {
    expect(isExplanationSafe('')).toBe(true)
  })

  it.each([
    ['will cure', 'This stack will cure your fatigue'],
    ['cures your', 'Magnesium cures your insomnia'],
    ['guaranteed to', 'This is guaranteed to work'],
    ['stop taking your medication', 'Stop taking your medication while using zinc'],
    ['stop taking your prescription', 'You can stop taking your prescription'],
    ['instead of your medication', 'Use magnesium instead of your medication'],
    ['replace your prescription', 'These supplements replace your prescription'],
    ['completely safe', 'This combination is completely safe'],
    ['no risk at all', 'There is no risk at all here'],
  ] as const)('returns false when text contains "%s"', (_phrase, text) => {
    expect(isExplanationSafe(text)).toBe(false)
  })

  it('is case-insensitive', () => {
    expect(isExplanationSafe('COMPLETELY SAFE to combine')).toBe(false)
  })

  it('EXPLANATION_BLOCKED_PHRASES is frozen', () => {
    expect(Object.isFrozen(EXPLANATION_BLOCKED_PHRASES)).toBe(true)
  })
})

// ── System prompt ────────────────────────────────────────────────

describe('RISK_EXPLANATION_SYSTEM_PROMPT', () => {
  it('states the severity bands for each risk level', () => {
    expect(RISK_EXPLANATION_SYSTEM_PROMPT).toContain('below 0.34 is "low"')
    expect(RISK_EXPLANATION_SYSTEM_PROMPT).toContain('below 0.67 is "moderate"')
    expect(RISK_EXPLANATION_SYSTEM_PROMPT).toContain('otherwise "high"')
  })

  it('tells the model to reference only stack compound names', () => {
    expect(RISK_EXPLANATION_SYSTEM_PROMPT).toContain('only names exactly as they appear in the stack')
  })
})

// ── formatStack ──────────────────────────────────────────────────

describe('formatStack', () => {
  it('formats dosage and timing', () => {
    expect(formatStack([{ name: 'Magnesium Glycinate', dosage: '400mg', timing: 'evening' }])).toBe(
      '- Magnesium Glycinate: 400mg (evening)'
    )
  })

  it('joins dosage and unit', () => {
    expect(formatStack([{ name: 'Vitamin D3', dosage: '5000', unit: 'IU', timing: 'morning' }])).toBe(
      '- Vitamin D3: 5000 IU (morning)'
    )
  })

  it('uses placeholders when metadata is missing', () => {
    expect(formatStack([{ name: 'Calcium' }, { name: 'Zinc Picolinate', unit: 'mg' }])).toBe(
      '- Calcium: N/A (unspecified)\n- Zinc Picolinate: N/A (unspecified)'
    )
  })
})

// ── formatScores ─────────────────────────────────────────────────

describe('formatScores', () => {
  it('lists severity first, then sub-scores in order', () => {
    expect(
      formatScores({ severity: 0.7, sub_scores: { cumulative_load: 0.5, timing_conflicts: 0.8 } })
    ).toBe('- severity: 0.7\n- cumulative_load: 0.5\n- timing_conflicts: 0.8')
  })

  it('lists severity alone when there are no sub-scores', () => {
    expect(formatScores({ severity: 0.05, sub_scores: {} })).toBe('- severity: 0.05')
  })
})

// ── buildExplanationPrompt ───────────────────────────────────────

describe('buildExplanationPrompt', () => {
  it('builds the full prompt from stack, scores and factors', () => {
    const prompt = buildExplanationPrompt(
      [
        { name: 'Magnesium Glycinate', dosage: '400mg', timing: 'evening' },
        { name: 'Vitamin D3' },
      ],
      { severity: 0.2, sub_scores: { cumulative_load: 0.4 }, factors: ['evening mineral load'] }
    )

    expect(prompt).toBe(
      [
        "User's current stack (2 compounds):",
        '- Magnesium Glycinate: 400mg (evening)',
        '- Vitamin D3: N/A (unspecified)',
        '',
        'Risk assessment scores (0.0 = no risk, 1.0 = maximum risk):',
        '- severity: 0.2',
        '- cumulative_load: 0.4',
        '',
        'Contributing factors:',
        '- evening mineral load',
        '',
        'Provide a clear, actionable risk explanation for this supplement combination.',
      ].join('\n')
    )
  })

  it('uses the singular for one compound and omits empty factors', () => {
    const prompt = buildExplanationPrompt([{ name: 'Vitamin D3' }], { severity: 0.05, sub_scores: {}, factors: [] })

    expect(prompt).toContain("User's current stack (1 compound):")
    expect(prompt).not.toContain('Contributing factors:')
  })
})
