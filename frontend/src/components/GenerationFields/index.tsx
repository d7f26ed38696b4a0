import { Form, Input, InputNumber, Select, Slider, Row, Col } from 'antd';
import type { GenerationOptions, ImageQuality } from '@/types';
import { DEFAULTS, IMAGE_SIZES, MAX_SEED, QUALITY_OPTIONS } from '@/constants';
import { LIMITS } from '@/utils/validation';

const { TextArea } = Input;

/** Form values shared by the generative tools */
export interface GenerationFieldValues {
  numberOfImages: number;
  imageSize: string;
  quality: ImageQuality;
  cfgScale: number;
  seed: number;
  prompt: string;
  negativePrompt?: string;
}

export const generationFieldDefaults: Omit<GenerationFieldValues, 'prompt'> = {
  numberOfImages: DEFAULTS.numberOfImages,
  imageSize: DEFAULTS.imageSize,
  quality: DEFAULTS.quality,
  cfgScale: DEFAULTS.cfgScale,
  seed: DEFAULTS.seed,
  negativePrompt: '',
};

export function toGenerationOptions(values: GenerationFieldValues): GenerationOptions {
  const size = IMAGE_SIZES.find((s) => s.value === values.imageSize) ?? IMAGE_SIZES[0];
  return {
    numberOfImages: values.numberOfImages,
    width: size.width,
    height: size.height,
    quality: values.quality,
    cfgScale: values.cfgScale,
    seed: values.seed,
  };
}

/** Seed input, also used by the editing tools */
export function SeedField() {
  return (
    <Form.Item name="seed" label="Seed" rules={[{ required: true, message: 'Seed is required' }]}>
      <InputNumber min={0} max={MAX_SEED} precision={0} style={{ width: '100%' }} />
    </Form.Item>
  );
}

export function PromptFields({ promptPlaceholder }: { promptPlaceholder?: string }) {
  return (
    <Row gutter={16}>
      <Col xs={24} md={12}>
        <Form.Item
          name="prompt"
          label="Prompt"
          rules={[{ required: true, whitespace: true, message: 'Please enter a prompt' }]}
        >
          <TextArea rows={4} placeholder={promptPlaceholder} maxLength={LIMITS.promptMaxLength} showCount />
        </Form.Item>
      </Col>
      <Col xs={24} md={12}>
        <Form.Item name="negativePrompt" label="Negative Prompt (Optional)">
          <TextArea rows={4} placeholder="What to leave out" maxLength={LIMITS.promptMaxLength} showCount />
        </Form.Item>
      </Col>
    </Row>
  );
}

/**
 * Count, size, quality, cfgScale and seed controls
 */
export function GenerationFields() {
  return (
    <>
      <Row gutter={16}>
        <Col xs={24} md={12}>
          <Form.Item name="numberOfImages" label="Number of images to generate">
            <Slider min={LIMITS.minImages} max={LIMITS.maxImages} step={1} marks={{ 1: '1', 5: '5' }} />
          </Form.Item>
        </Col>
        <Col xs={24} md={12}>
          <Form.Item name="imageSize" label="Image size">
            <Select options={IMAGE_SIZES.map((s) => ({ value: s.value, label: s.value }))} />
          </Form.Item>
        </Col>
      </Row>
      <Row gutter={16}>
        <Col xs={24} md={8}>
          <Form.Item name="cfgScale" label="cfgScale">
            <Slider min={LIMITS.minCfgScale} max={LIMITS.maxCfgScale} step={0.1} />
          </Form.Item>
        </Col>
        <Col xs={24} md={8}>
          <Form.Item name="quality" label="Quality">
            <Select options={QUALITY_OPTIONS} />
          </Form.Item>
        </Col>
        <Col xs={24} md={8}>
          <SeedField />
        </Col>
      </Row>
    </>
  );
}
