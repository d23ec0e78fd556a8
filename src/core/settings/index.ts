export {
  SettingsService,
  type SettingsServiceOptions,
  type SettingName,
  type SettingChange,
} from './settings-service';
