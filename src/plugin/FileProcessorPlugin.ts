export type PluginConfig = Record<string, unknown>;

/**
 * 檔案處理 plugin 的介面，由 host 逐檔呼叫。
 * 所有方法都不應拋出例外，失敗以 false 表示。
 */
export interface FileProcessorPlugin {
  readonly name: string;
  readonly version: string;

  /** 純檢查，不修改檔案 */
  canHandle(filePath: string): Promise<boolean>;

  initialize(config: PluginConfig): Promise<boolean>;

  process(filePath: string, config: PluginConfig): Promise<boolean>;
}
