import { useSearchParams } from 'react-router-dom';

import { isAnalysisTab, type AnalysisTab } from '../api.js';
import { AnalysisForm, type UploadField } from '../components/AnalysisForm.js';
import { TabPanel, Tabs, type TabItem } from '../components/Tabs.js';

const TABS: readonly TabItem<AnalysisTab>[] = [
  { id: 'image', label: 'Image Analysis' },
  { id: 'code', label: 'Code Analysis' },
  { id: 'combined', label: 'Combined Analysis' },
];

const IMAGE_FIELD: UploadField = {
  name: 'file',
  label: 'Image',
  hint: 'Drop a screenshot or diagram here, or click to browse',
  accept: 'image/*',
};

const CODE_FIELD: UploadField = {
  name: 'code_file',
  label: 'Code file',
  hint: 'Drop a source file here, or click to browse',
};

export function HomePage() {
  const [searchParams, setSearchParams] = useSearchParams();
  const tabFromQuery = searchParams.get('tab');
  const activeTab: AnalysisTab = isAnalysisTab(tabFromQuery) ? tabFromQuery : 'image';

  function selectTab(tab: AnalysisTab) {
    setSearchParams({ tab }, { replace: true });
  }

  return (
    <div className="page">
      <h1 className="title">Multimodal Technical Analysis</h1>
      <p className="subtitle">Upload a screenshot, a code file, or both to get issues and recommendations.</p>

      <Tabs tabs={TABS} active={activeTab} onSelect={selectTab} />

      <TabPanel id="image" active={activeTab}>
        <AnalysisForm tab="image" fields={[IMAGE_FIELD]} submitLabel="Analyze Image" />
      </TabPanel>

      <TabPanel id="code" active={activeTab}>
        <AnalysisForm tab="code" fields={[CODE_FIELD]} submitLabel="Analyze Code" />
      </TabPanel>

      <TabPanel id="combined" active={activeTab}>
        <AnalysisForm
          tab="combined"
          fields={[{ ...IMAGE_FIELD, name: 'image_file' }, CODE_FIELD]}
          contextField={{
            name: 'context',
            label: 'Context (optional)',
            placeholder: 'What were you doing when the problem appeared?',
          }}
          submitLabel="Analyze Both"
        />
      </TabPanel>
    </div>
  );
}
