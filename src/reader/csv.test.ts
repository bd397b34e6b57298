import { describe, expect, it } from 'vitest'
import { parseRecords, RecordLoadError } from './csv'

const HEADER =
  'Master_Index,County,Health level,Years of Experience,Prompt,Nursing Competency,Clinical Panel,Clinician,GPT4.0,LLAMA,GEMINI,DDX SNOMED'

describe('parseRecords', () => {
  it('maps every known column to its field', async () => {
    const csv = [
      HEADER,
      '1,Kiambu,Level 4,5,"Child, 3 years, fever",Paediatrics,Paediatrics,Malaria,Malaria,Pneumonia,Malaria,61462000'
    ].join('\n')
    const result = await parseRecords(csv, 'test.csv')
    expect(result.rowCount).toBe(1)
    expect(result.warnings).toEqual([])
    expect(result.records).toEqual([
      {
        master_index: '1',
        county: 'Kiambu',
        health_level: 'Level 4',
        years_experience: '5',
        prompt: 'Child, 3 years, fever',
        nursing_competency: 'Paediatrics',
        clinical_panel: 'Paediatrics',
        clinician: 'Malaria',
        gpt4_0: 'Malaria',
        llama: 'Pneumonia',
        gemini: 'Malaria',
        ddx_snomed: '61462000'
      }
    ])
  })

  it('trims cells and treats empty cells as missing', async () => {
    const csv = [HEADER, '2, Nakuru ,,,,,Maternal,Eclampsia,,,,'].join('\n')
    const { records } = await parseRecords(csv, 'test.csv')
    expect(records).toEqual([
      { master_index: '2', county: 'Nakuru', clinical_panel: 'Maternal', clinician: 'Eclampsia' }
    ])
  })

  it('warns about records with neither Clinician nor GPT4.0', async () => {
    const csv = [HEADER, '3,Kisumu,,,,,Maternal,,,Malaria,,'].join('\n')
    const { records, warnings } = await parseRecords(csv, 'test.csv')
    expect(records).toHaveLength(1)
    expect(warnings).toEqual(['Record 1 in test.csv is missing both Clinician and GPT4.0'])
  })

  it('ignores unknown columns and tolerates missing ones', async () => {
    const csv = ['County,Notes,Clinician', 'Kisumu,seen twice,Malaria'].join('\n')
    expect((await parseRecords(csv)).records).toEqual([{ county: 'Kisumu', clinician: 'Malaria' }])
  })

  it('accepts short rows', async () => {
    const csv = [HEADER, '4,Kisumu'].join('\n')
    expect((await parseRecords(csv)).records).toEqual([{ master_index: '4', county: 'Kisumu' }])
  })

  it('skips blank lines', async () => {
    const csv = [HEADER, '', '5,Kiambu,,,,,,Malaria,,,,', '', ''].join('\n')
    const result = await parseRecords(csv)
    expect(result.rowCount).toBe(1)
    expect(result.records).toEqual([{ master_index: '5', county: 'Kiambu', clinician: 'Malaria' }])
  })

  it('ignores columns named after object properties', async () => {
    const csv = ['County,constructor,toString', 'Kisumu,oops,again'].join('\n')
    expect((await parseRecords(csv)).records).toEqual([{ county: 'Kisumu' }])
  })

  it('skips malformed rows with a warning', async () => {
    const csv = [HEADER, '5,Kiambu,,,,,,Malaria,,,,', '6,"Kisumu'].join('\n')
    const result = await parseRecords(csv, 'test.csv')
    expect(result.records).toEqual([{ master_index: '5', county: 'Kiambu', clinician: 'Malaria' }])
    expect(result.warnings).toHaveLength(1)
    expect(result.warnings[0]).toMatch(/^Skipped malformed row in test\.csv: /)
  })

  it('rejects content without data rows', async () => {
    await expect(parseRecords(HEADER, 'empty.csv')).rejects.toThrow(RecordLoadError)
    await expect(parseRecords(HEADER, 'empty.csv')).rejects.toThrow(
      'No valid records in empty.csv'
    )
  })
})
