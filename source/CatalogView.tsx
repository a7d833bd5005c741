import React, { useState, useMemo } from 'react';
import { Box, Text, useInput, useApp } from 'ink';
import type { CatalogViewModel } from './services/localizationService.js';
import { coveragePercent } from './utils/format.js';

interface CatalogViewProps {
  model: CatalogViewModel;
  initialLanguage?: string;
}

function truncate(text: string, width: number): string {
  const flat = text.replace(/\\n|\n/g, ' ⏎ ');
  return flat.length > width ? `${flat.slice(0, Math.max(0, width - 1))}…` : flat;
}

export const CatalogView: React.FC<CatalogViewProps> = ({ model, initialLanguage }) => {
  const targets = useMemo(
    () => model.languages.filter(language => language.code !== model.sourceLanguage),
    [model],
  );
  const [selectedIndex, setSelectedIndex] = useState(0);
  const [languageIndex, setLanguageIndex] = useState(() => {
    const preferred = model.preview?.language ?? initialLanguage;
    return Math.max(0, targets.findIndex(language => language.code === preferred));
  });
  const [showHelp, setShowHelp] = useState(false);
  const [showStats, setShowStats] = useState(false);
  const { exit } = useApp();

  const items = model.rows;
  const currentLanguage = targets[languageIndex];
  const currentCoverage = currentLanguage ? model.coverage[currentLanguage.code] : undefined;

  // Handle terminal size for scrolling
  const terminalHeight = process.stdout.rows || 30;
  const terminalWidth = process.stdout.columns || 100;
  const reservedLines = showHelp ? 18 : showStats ? 8 + model.languages.length : 8;
  const maxVisibleItems = Math.max(5, terminalHeight - reservedLines);
  const scrollOffset = Math.max(0, Math.min(selectedIndex - maxVisibleItems + 1, items.length - maxVisibleItems));
  const visibleItems = items.slice(scrollOffset, scrollOffset + maxVisibleItems);
  const keyWidth = Math.min(28, Math.max(8, ...items.map(item => item.key.length)));
  const textWidth = Math.max(10, Math.floor((terminalWidth - keyWidth - 8) / 2));

  useInput((input, key) => {
    if (key.upArrow) {
      setSelectedIndex(prev => Math.max(0, prev - 1));
    } else if (key.downArrow) {
      setSelectedIndex(prev => Math.min(items.length - 1, prev + 1));
    } else if (key.pageUp) {
      setSelectedIndex(prev => Math.max(0, prev - 10));
    } else if (key.pageDown) {
      setSelectedIndex(prev => Math.min(items.length - 1, prev + 10));
    }

    // Language switching
    if (targets.length > 0) {
      if (key.leftArrow) {
        setLanguageIndex(prev => (prev - 1 + targets.length) % targets.length);
      } else if (key.rightArrow) {
        setLanguageIndex(prev => (prev + 1) % targets.length);
      }
    }

    if (input === 'h' || input === '?') {
      setShowHelp(prev => !prev);
      setShowStats(false);
    }

    if (input === 'i') {
      setShowStats(prev => !prev);
      setShowHelp(false);
    }

    if (input === 'q' || key.escape) {
      exit();
    }
  });

  const selectedItem = items[selectedIndex];

  return (
    <Box flexDirection="column">
      {/* Header */}
      <Box borderStyle="round" borderColor="cyan" paddingX={1} marginBottom={1}>
        <Text bold color="cyan">Translation Catalog</Text>
        <Text color="gray"> │ </Text>
        <Text color="yellow">{model.sourceLanguage.toUpperCase()}</Text>
        <Text color="gray"> → </Text>
        <Text color="yellow">
          {currentLanguage ? `${currentLanguage.emoji} ${currentLanguage.code.toUpperCase()}`.trim() : '—'}
        </Text>
        {currentCoverage && (
          <>
            <Text color="gray"> │ </Text>
            <Text color={currentCoverage.missingCount === 0 ? 'green' : 'yellow'}>
              {currentCoverage.filledCount}/{currentCoverage.totalCanonicalKeys} ({coveragePercent(currentCoverage)}%)
            </Text>
          </>
        )}
        {model.preview && (
          <>
            <Text color="gray"> │ </Text>
            <Text color="magenta">preview, not saved</Text>
          </>
        )}
      </Box>

      {/* Rows */}
      <Box flexDirection="column" height={maxVisibleItems}>
        {visibleItems.map((item, visualIndex) => {
          const actualIndex = scrollOffset + visualIndex;
          const isSelected = actualIndex === selectedIndex;
          const sourceText = item.texts[model.sourceLanguage];
          const targetText = currentLanguage ? item.texts[currentLanguage.code] : undefined;

          return (
            <Box key={item.key}>
              <Text color={isSelected ? 'cyan' : 'gray'}>{isSelected ? '▶' : ' '}</Text>
              <Text color={isSelected ? 'cyan' : 'white'}> {truncate(item.key, keyWidth).padEnd(keyWidth)} </Text>
              <Text color="gray">{truncate(sourceText ?? '', textWidth).padEnd(textWidth)} </Text>
              {targetText === undefined ? (
                <Text color="red">missing</Text>
              ) : (
                <Text color={item.previewed ? 'magenta' : 'green'}>{truncate(targetText, textWidth)}</Text>
              )}
            </Box>
          );
        })}
      </Box>

      {items.length > maxVisibleItems && !showHelp && !showStats && (
        <Box marginTop={1}>
          <Text color="gray">
            [{scrollOffset + 1}-{Math.min(scrollOffset + maxVisibleItems, items.length)} of {items.length}]
          </Text>
        </Box>
      )}

      {/* Help panel */}
      {showHelp && (
        <Box borderStyle="single" borderColor="yellow" padding={1} marginTop={1} flexDirection="column">
          <Text bold color="yellow">Keyboard Shortcuts</Text>
          <Text> </Text>
          <Box flexDirection="row">
            <Box flexDirection="column" marginRight={2}>
              <Text color="cyan">Navigation:</Text>
              <Text>  ↑/↓     Move between keys</Text>
              <Text>  PgUp/Dn Move faster</Text>
            </Box>
            <Box flexDirection="column" marginRight={2}>
              <Text color="cyan">Language:</Text>
              <Text>  ←/→  Previous/next language</Text>
            </Box>
            <Box flexDirection="column">
              <Text color="cyan">Other:</Text>
              <Text>  h/?  Toggle help</Text>
              <Text>  i    Toggle coverage</Text>
              <Text>  q    Quit</Text>
            </Box>
          </Box>
          <Text> </Text>
          <Text color="gray">Press h to close help</Text>
        </Box>
      )}

      {/* Coverage panel */}
      {showStats && (
        <Box borderStyle="single" borderColor="green" padding={1} marginTop={1} flexDirection="column">
          <Text bold color="green">Coverage</Text>
          <Text> </Text>
          {model.languages.map(language => {
            const record = model.coverage[language.code];
            if (!record) return null;
            return (
              <Text key={language.code}>
                <Text color="cyan">{language.code.toUpperCase().padEnd(5)}</Text>
                {language.nameInSource}: {record.filledCount}/{record.totalCanonicalKeys}
                {record.missingCount > 0 && <Text color="yellow"> ({record.missingCount} missing)</Text>}
              </Text>
            );
          })}
          {model.unusedLanguages.length > 0 && (
            <Text color="gray">
              Ready to onboard: {model.unusedLanguages.map(language => language.code).join(', ')}
            </Text>
          )}
          <Text> </Text>
          <Text color="gray">Press i to close coverage</Text>
        </Box>
      )}

      {/* Footer */}
      <Box marginTop={1} borderStyle="single" borderColor="gray" paddingX={1}>
        <Text color="gray">↑↓ Keys • ←→ Language • h: Help • i: Coverage • q: Quit</Text>
      </Box>

      {selectedItem?.description && !showHelp && !showStats && (
        <Box marginTop={1}>
          <Text color="gray" dimColor>
            {selectedItem.key}: {selectedItem.description}
          </Text>
        </Box>
      )}
    </Box>
  );
};
