import { useState } from 'react';
import { Upload, Typography, message } from 'antd';
import { InboxOutlined } from '@ant-design/icons';
import { readImageFile, type LoadedImage } from '@/utils/canvas';
import { formatFileSize } from '@/utils/format';
import { ACCEPTED_IMAGE_TYPES, MAX_UPLOAD_BYTES } from '@/constants';
import styles from './ImageUpload.module.css';

const { Dragger } = Upload;
const { Text } = Typography;

interface ImageUploadProps {
  onLoaded: (image: LoadedImage, file: File) => void;
  disabled?: boolean;
  label?: string;
}

/**
 * Drag-and-drop uploader; hands back the decoded image, never uploads anywhere
 */
export function ImageUpload({ onLoaded, disabled, label = 'Click or drag an image here' }: ImageUploadProps) {
  const [reading, setReading] = useState(false);

  const handleFile = async (file: File) => {
    if (!ACCEPTED_IMAGE_TYPES.includes(file.type)) {
      message.error('Only PNG and JPEG images are supported');
      return;
    }
    if (file.size > MAX_UPLOAD_BYTES) {
      message.error(`The image is ${formatFileSize(file.size)}; the limit is ${formatFileSize(MAX_UPLOAD_BYTES)}`);
      return;
    }
    setReading(true);
    try {
      const image = await readImageFile(file);
      onLoaded(image, file);
    } catch (e) {
      console.error('[Upload]', e);
      message.error('The file could not be read as an image');
    } finally {
      setReading(false);
    }
  };

  return (
    <Dragger
      accept={ACCEPTED_IMAGE_TYPES.join(',')}
      maxCount={1}
      showUploadList={false}
      beforeUpload={(file) => {
        void handleFile(file);
        return false;
      }}
      className={styles.uploader}
      disabled={disabled || reading}
    >
      <p className="ant-upload-drag-icon">
        <InboxOutlined />
      </p>
      <p className="ant-upload-text">{reading ? 'Reading image...' : label}</p>
      <p className="ant-upload-hint">
        <Text type="secondary">PNG / JPEG, up to {formatFileSize(MAX_UPLOAD_BYTES)}</Text>
      </p>
    </Dragger>
  );
}
