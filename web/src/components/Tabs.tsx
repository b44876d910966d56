export type TabItem<T extends string> = {
  id: T;
  label: string;
};

export function Tabs<T extends string>({
  tabs,
  active,
  onSelect,
}: {
  tabs: readonly TabItem<T>[];
  active: T;
  onSelect: (id: T) => void;
}) {
  return (
    <div className="tabs" role="tablist">
      {tabs.map((t) => (
        <button
          key={t.id}
          id={`tab-${t.id}`}
          className={t.id === active ? 'tab active' : 'tab'}
          type="button"
          role="tab"
          aria-selected={t.id === active}
          aria-controls={`panel-${t.id}`}
          onClick={() => onSelect(t.id)}
        >
          {t.label}
        </button>
      ))}
    </div>
  );
}

export function TabPanel({ id, active, children }: { id: string; active: string; children: React.ReactNode }) {
  return (
    <div className="tab-content" role="tabpanel" id={`panel-${id}`} aria-labelledby={`tab-${id}`} hidden={id !== active}>
      {children}
    </div>
  );
}
