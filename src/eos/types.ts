/**
 * Eos Record Types
 *
 * Shapes of the console objects the client reads: cue identities (as shown
 * in the playback notifications) and the property records returned by cue,
 * group and macro queries.
 */

/** Cue identity, e.g. list 1 cue 10.5 part 2 */
export interface Cue {
  cuelist: number;
  cue: number;
  part: number;              // 0 = the whole cue
  duration?: number;
  percentage?: number;       // playback progress 0.0-1.0
}

/** Positional fields of a cue reply, in console order */
export interface CueFields {
  index: number;
  uid: string;
  label: string;

  upTime: number;
  upDelay: number;
  downTime: number;
  downDelay: number;
  focusTime: number;
  focusDelay: number;
  colorTime: number;
  colorDelay: number;
  beamTime: number;
  beamDelay: number;

  preheat: boolean;
  curve: number;
  rate: number;

  mark: string;
  block: string;             // contains "B" (block) and/or "I" (intensity block)
  assert: string;            // contains "A" when asserted
  link: string;

  followTime: number;
  hangTime: number;
  allFade: boolean;
  loop: number;
  solo: boolean;
  timecode: string;
  partCount: number;
  notes: string;
  scene: string;
  sceneEnd: boolean;
  cuePartIndex: number;
}

/**
 * Full cue record. `fx`, `links` and `actions` are only set when the
 * console reports entries for them.
 */
export interface CueProperties extends CueFields {
  cuelist: number;
  cue: number;
  part: number;
  fx?: string[];
  links?: string[];
  actions?: string[];
}

export interface GroupProperties {
  number: number;
  uid: string;
  label: string;
  channels: string[];        // ranges as the console reports them, e.g. "1-5", "7"
}

export interface MacroProperties {
  number: number;
  uid: string;
  label: string;
  mode: string;
  command: string[];
}

/** Targets accepted by /eos/get/<target>/count */
export const EOS_TARGETS = [
  'patch',
  'cuelist',
  'cue',
  'group',
  'macro',
  'sub',
  'preset',
  'ip',
  'fp',
  'cp',
  'bp',
  'curve',
  'fx',
  'snap',
  'pixmap',
  'ms',
] as const;

export type EosTarget = (typeof EOS_TARGETS)[number];

export function isEosTarget(value: string): value is EosTarget {
  return EOS_TARGETS.some((t) => t === value);
}

/** Tab numbers, as typed after holding the Tab key */
export enum EosTab {
  ChannelsTable = 1,
  Psd = 2,
  MagicSheet = 3,
  DirectSelects = 4,
  MlControls = 5,
  EffectStatus = 6,
  VirtualKeyboard = 7,
  EffectChannels = 8,
  PixelMaps = 9,
  PixelMapPreview = 10,
  ShowControl = 11,
  Patch = 12,
  Effects = 13,
  MagicSheetList = 14,
  Submasters = 15,
  Cues = 16,
  Groups = 17,
  Macros = 18,
  Snapshots = 19,
  Park = 20,
  Curves = 21,
  IntensityPalettes = 22,
  FocusPalettes = 23,
  ColorPalettes = 24,
  BeamPalettes = 25,
  Presets = 26,
  ColorPicker = 27,
  Faders = 28,
  About = 29,
  CommandHistory = 30,
  LampControls = 31,
  ChannelsInUse = 32,
  ColorPaths = 33,
  FaderListDisplay = 35,
  FaderConfig = 36,
  SacnOutputViewer = 37,
  Augment3d = 38,
  CustomDirectSelects = 39,
  EncoderMaps = 40,
  Diagnostics = 99,
  Manual = 100,
}
