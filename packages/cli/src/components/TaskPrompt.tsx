import React, { useState } from 'react';
import { Box, Text } from 'ink';
import TextInput from 'ink-text-input';
import { TASK_TYPES } from '@tasksnap/shared';
import { THEME } from '../theme.js';

export interface TaskAnswers {
  description: string;
  type: string;
  files: string;
  title: string;
}

type Field = keyof TaskAnswers;

const STEPS: { field: Field; label: string; placeholder: string }[] = [
  { field: 'description', label: 'Description', placeholder: 'What should the agent do?' },
  { field: 'type', label: 'Type', placeholder: TASK_TYPES.join(' | ') },
  { field: 'files', label: 'Files', placeholder: 'comma-separated, empty for the whole project' },
  { field: 'title', label: 'Title', placeholder: 'empty to derive from the description' },
];

interface TaskPromptProps {
  initial: TaskAnswers;
  onDone: (answers: TaskAnswers) => void;
}

/** Step-by-step task setup for `task start --interactive`. */
export const TaskPrompt: React.FC<TaskPromptProps> = ({ initial, onDone }) => {
  const [answers, setAnswers] = useState<TaskAnswers>(initial);
  const [step, setStep] = useState(0);
  const [value, setValue] = useState(initial[STEPS[0].field]);

  const current = STEPS[step];

  const handleSubmit = (val: string) => {
    const trimmed = val.trim();
    // Description is the only required answer
    if (current.field === 'description' && !trimmed) return;

    const next = { ...answers, [current.field]: trimmed };
    setAnswers(next);
    if (step + 1 >= STEPS.length) {
      onDone(next);
      return;
    }
    setStep(step + 1);
    setValue(next[STEPS[step + 1].field]);
  };

  return (
    <Box flexDirection="column" borderStyle="single" borderColor={THEME.accent} paddingX={1}>
      <Text bold color={THEME.primary}>
        ◆ NEW TASK
      </Text>
      {STEPS.slice(0, step).map((s) => (
        <Text key={s.field} color={THEME.textDim}>
          {s.label}: {answers[s.field] || '-'}
        </Text>
      ))}
      <Box>
        <Text color={THEME.accent} bold>
          {`${current.label}> `}
        </Text>
        <TextInput
          value={value}
          onChange={setValue}
          onSubmit={handleSubmit}
          placeholder={current.placeholder}
        />
      </Box>
    </Box>
  );
};
