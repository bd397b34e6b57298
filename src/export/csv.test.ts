import { describe, expect, it } from 'vitest'
import { createRecord } from '../test-support'
import type { Prediction, PredictionRow } from '../types'
import { exportPredictionsToCSV } from './csv'

const PREDICTION: Prediction = {
  clinician: 'Malaria',
  gpt4_0: 'Malaria',
  llama: 'Malaria',
  gemini: 'Pneumonia',
  ddx_snomed: '61462000'
}

function createRow(overrides: Partial<Prediction> = {}): PredictionRow {
  return {
    record: createRecord({ master_index: '7', county: 'kiambu', clinical_panel: 'paediatrics' }),
    prediction: { ...PREDICTION, ...overrides }
  }
}

describe('CSV Export', () => {
  describe('exportPredictionsToCSV', () => {
    it('writes the header row', () => {
      const lines = exportPredictionsToCSV([]).split('\n')

      expect(lines).toEqual([
        'id,master_index,clinical_panel,county,health_level,years_experience,clinician,gpt4_0,llama,gemini,ddx_snomed'
      ])
    })

    it('exports record attributes followed by predictions', () => {
      const lines = exportPredictionsToCSV([createRow()]).split('\n')

      expect(lines).toHaveLength(2)
      expect(lines[1]).toBe('1,7,paediatrics,kiambu,,,Malaria,Malaria,Malaria,Pneumonia,61462000')
    })

    it('uses 1-indexed IDs in output', () => {
      const lines = exportPredictionsToCSV([createRow(), createRow(), createRow()]).split('\n')

      expect(lines).toHaveLength(4)
      expect(lines[3]?.startsWith('3,')).toBe(true)
    })

    it('escapes commas in content', () => {
      const lines = exportPredictionsToCSV([createRow({ gpt4_0: 'Malaria, severe' })]).split('\n')

      expect(lines[1]).toBe(
        '1,7,paediatrics,kiambu,,,Malaria,"Malaria, severe",Malaria,Pneumonia,61462000'
      )
    })

    it('escapes quotes in content', () => {
      const lines = exportPredictionsToCSV([createRow({ llama: 'The "usual" fever' })]).split('\n')

      expect(lines[1]).toBe(
        '1,7,paediatrics,kiambu,,,Malaria,Malaria,"The ""usual"" fever",Pneumonia,61462000'
      )
    })

    it('quotes values with newlines', () => {
      const csv = exportPredictionsToCSV([createRow({ gemini: 'Line 1\nLine 2' })])

      expect(csv).toContain('"Line 1\nLine 2"')
    })
  })
})
