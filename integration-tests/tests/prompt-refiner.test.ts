/**
 * Prompt refiner run: parameter selection and labelled documents
 */

import * as fs from 'fs';
import * as path from 'path';
import { CumulativeTable, type PromptLibrary, type RefinerConfig } from '@epiparam/shared';
import {
  labelledDocuments,
  runRefinement,
  selectParameters,
} from '../../services/prompt-refiner/src/lib/run';
import {
  FakeChatCompleter,
  FakeTextProvider,
  documentText,
  isStage2,
  makeTempDir,
  removeDir,
  touchPdfs,
} from './helpers';

const LIBRARY: PromptLibrary = {
  systemPrompt: 'SYS',
  ragSystemPrompt: 'SYS',
  refinePrompt: 'REFINE',
  parameters: [{ name: 'Case fatality rate', description: '' }],
};

const REFINER_CONFIG: RefinerConfig = {
  retrievalInstructions: 'Retrieve carefully.',
  parameters: [
    { name: 'Case fatality rate', description: '', truthColumn: 'CFR', basePrompt: 'Find the CFR.' },
    { name: 'Obesity prevalence', description: '', truthColumn: 'Obesity', basePrompt: null },
  ],
};

describe('prompt refiner run', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('refines the selected parameter over documents with PDFs and truth', async () => {
    const folder = path.join(dir, 'papers');
    touchPdfs(folder, ['paperA.pdf', 'paperB.pdf']);
    const truth = path.join(dir, 'truth.csv');
    fs.writeFileSync(truth, 'PDF,CFR,Obesity\npaperA.pdf,NA,30\npaperB.pdf,20,\npaperC.pdf,5,5\n');
    const results = path.join(dir, 'refinement.csv');

    const chat = new FakeChatCompleter((messages) => {
      if (!isStage2(messages)) return messages[1].content;
      return messages[1].content.includes('398')
        ? '{"Case fatality rate": "20.10%"}'
        : '{"Case fatality rate": "Not found"}';
    });
    const refiner = new FakeChatCompleter(() => 'unused');
    const textProvider = new FakeTextProvider({
      paperA: documentText('paperA', [{ heading: 'Results', body: 'Nobody died.' }]),
      paperB: documentText('paperB', [{ heading: 'Results', body: '80 of 398 died.' }]),
    });

    const states = await runRefinement(
      { folder, results, truth, budget: 1, tolerance: 1, parameter: 'Case fatality rate' },
      LIBRARY,
      REFINER_CONFIG,
      { chat, refiner, textProvider }
    );

    expect(states).toHaveLength(1);
    expect(states[0].iteration).toBe(1);
    expect(states[0].history[0].metrics.counts).toEqual({ TP: 1, TN: 1, FP: 0, FN: 0 });
    expect(refiner.calls).toHaveLength(0);

    const rows = await new CumulativeTable(results).read();
    expect(rows.map((r) => [r.document_id, r.true_value, r.extracted_value, r.model_name])).toEqual([
      ['paperA', 'NA', 'Not found', 'fake-model'],
      ['paperB', '20', '20.10%', 'fake-model'],
    ]);
  });

  it('selects configured parameters by name', () => {
    expect(selectParameters(REFINER_CONFIG, null)).toHaveLength(2);
    expect(selectParameters(REFINER_CONFIG, 'Obesity prevalence').map((p) => p.truthColumn)).toEqual([
      'Obesity',
    ]);
    expect(() => selectParameters(REFINER_CONFIG, 'R0')).toThrow(
      'Parameter "R0" is not configured for refinement'
    );
  });

  it('pairs ground truth with PDFs', () => {
    const documents = labelledDocuments(
      'CFR',
      [
        { documentId: 'paperA', parameterName: 'CFR', trueValue: 5 },
        { documentId: 'paperZ', parameterName: 'CFR', trueValue: 6 },
        { documentId: 'paperA', parameterName: 'Obesity', trueValue: 7 },
      ],
      ['/papers/paperA.pdf']
    );

    expect(documents).toEqual([{ documentId: 'paperA', filePath: '/papers/paperA.pdf', trueValue: 5 }]);
  });
});
