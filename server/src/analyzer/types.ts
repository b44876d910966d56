export type AnalysisKind = 'image' | 'code' | 'combined';

export type UploadedFile = {
  fileName: string;
  mimeType: string;
  size: number;
  buffer: Buffer;
};

export type FunctionRecord = {
  name: string;
  params: string;
  line: number;
  type?: 'arrow';
};

export type ClassRecord = {
  name: string;
  inherits?: string;
  implements?: string;
  line: number;
  type?: 'class' | 'struct';
};

export type ImportRecord = {
  statement: string;
  line: number;
};

export type VariableRecord = {
  name: string;
  line: number;
  value?: string;
  type?: string;
};

export type CommentRecord = {
  line: number;
  text: string;
};

export type StaticIssueType = 'todo' | 'security' | 'style' | 'bug' | 'debug';

export type StaticIssue = {
  type: StaticIssueType;
  line: number;
  description: string;
};

export type ParsedCode = {
  language: string;
  line_count: number;
  functions: FunctionRecord[];
  classes: ClassRecord[];
  imports: ImportRecord[];
  variables: VariableRecord[];
  comments: CommentRecord[];
  potential_issues: StaticIssue[];
};

export type ComplexityMetrics = {
  cyclomatic_complexity: number;
  nesting_depth: number;
  function_count: number;
  class_count: number;
  line_count: number;
  comment_ratio: number;
};

export type CodeIssue = {
  description: string;
  details?: string;
  solution?: string;
};

export type CodeStructure = {
  functions: string[];
  classes: string[];
  imports: number;
};

export type ImageAnalysis = {
  description: string;
  detected_elements: string[];
  potential_issues: string[];
};

export type CodeAnalysis = {
  language: string;
  summary: string;
  issues: CodeIssue[];
  suggestions: string[];
  full_analysis: string;
  static_issues: StaticIssue[];
  structure: CodeStructure;
  metrics: ComplexityMetrics;
};

export type CombinedAnalysis = {
  combined_analysis: string;
  language: string;
  image_elements: string[];
  code_issues: CodeIssue[];
  correlations: string[];
  root_causes: string[];
};

export type AnalysisResult = ImageAnalysis | CodeAnalysis | CombinedAnalysis;

export type AnalysisEnvelope<T extends AnalysisResult = AnalysisResult> = {
  analysis_id: string;
  result: T;
  recommendations: string[];
  timestamp: string;
};
