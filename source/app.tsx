import React, { useState, useEffect } from 'react';
import { Text, Box } from 'ink';
import { Spinner } from '@inkjs/ui';
import { CatalogView } from './CatalogView.js';
import type { CatalogViewModel, LocalizationService } from './services/localizationService.js';

type Props = {
	service: LocalizationService;
	previewLanguage?: string;
	language?: string;
};

export default function App({ service, previewLanguage, language }: Props) {
	const [model, setModel] = useState<CatalogViewModel | null>(null);
	const [error, setError] = useState<string | null>(null);
	const [loading, setLoading] = useState(true);

	useEffect(() => {
		let cancelled = false;
		void service
			.buildView(previewLanguage)
			.then(data => {
				if (!cancelled) setModel(data);
			})
			.catch((err: unknown) => {
				if (!cancelled) setError(err instanceof Error ? err.message : 'Failed to load catalog');
			})
			.finally(() => {
				if (!cancelled) setLoading(false);
			});
		return () => {
			cancelled = true;
		};
	}, [service, previewLanguage]);

	if (loading) {
		return (
			<Box flexDirection="column" padding={1}>
				<Text color="cyan">
					{previewLanguage
						? `Loading catalog and translating missing keys for ${previewLanguage.toUpperCase()}...`
						: 'Loading catalog...'}
				</Text>
				<Box marginTop={1}>
					<Spinner type="dots" />
				</Box>
			</Box>
		);
	}

	if (error) {
		return (
			<Box flexDirection="column" padding={1}>
				<Text color="red">Error: {error}</Text>
				<Text color="gray">Try running: l10n-backfill validate</Text>
			</Box>
		);
	}

	if (!model || model.rows.length === 0) {
		return (
			<Box padding={1}>
				<Text color="yellow">No translations found</Text>
			</Box>
		);
	}

	return <CatalogView model={model} initialLanguage={language} />;
}
