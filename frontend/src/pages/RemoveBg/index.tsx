import { useState } from 'react';
import { Card, Button, Typography, Image, Space, message } from 'antd';
import { ScissorOutlined } from '@ant-design/icons';
import { useRemoveBgStore } from '@/stores';
import { ToolHeader } from '@/components/ToolHeader';
import { ImageUpload } from '@/components/ImageUpload';
import { ResultGallery } from '@/components/ResultGallery';
import type { LoadedImage } from '@/utils/canvas';
import { formatDimensions, formatFileSize } from '@/utils/format';
import { INPUT_IMAGE_INFO } from '@/constants';
import styles from '../tool.module.css';

const { Text } = Typography;

export default function RemoveBgPage() {
  const result = useRemoveBgStore((s) => s.result);
  const loading = useRemoveBgStore((s) => s.loading);
  const error = useRemoveBgStore((s) => s.error);
  const run = useRemoveBgStore((s) => s.run);
  const reset = useRemoveBgStore((s) => s.reset);
  const clearError = useRemoveBgStore((s) => s.clearError);

  const [image, setImage] = useState<LoadedImage | null>(null);
  const [fileSize, setFileSize] = useState(0);

  const handleLoaded = (loaded: LoadedImage, file: File) => {
    setImage(loaded);
    setFileSize(file.size);
    reset();
  };

  /** Submit background removal */
  const handleRemoveBg = async () => {
    if (!image) {
      message.warning('Please upload an image first');
      return;
    }
    await run({ kind: 'removeBackground', image: image.source });
  };

  return (
    <div className={styles.container}>
      <ToolHeader
        icon={<ScissorOutlined />}
        title="Remove Image Background"
        caption="Isolate the main subject of an image on a transparent background"
        info={[INPUT_IMAGE_INFO]}
      >
        Upload an image, then press Remove Background.
      </ToolHeader>

      <Card className={styles.formCard} bordered={false}>
        <ImageUpload onLoaded={handleLoaded} disabled={loading} />

        {image && (
          <div className={styles.preview}>
            <Image src={image.previewUrl} alt="Uploaded image" className={styles.previewImage} />
            <Space size="large">
              <Text type="secondary">{formatDimensions(image.source)}</Text>
              <Text type="secondary">{formatFileSize(fileSize)}</Text>
            </Space>
          </div>
        )}

        <Button
          type="primary"
          icon={<ScissorOutlined />}
          size="large"
          block
          loading={loading}
          disabled={!image}
          onClick={handleRemoveBg}
          className={styles.submitBtn}
        >
          {loading ? 'Processing...' : 'Remove Background'}
        </Button>
      </Card>

      <ResultGallery
        result={result}
        loading={loading}
        error={error}
        prefix="background-removed"
        title="Image with Background Removed"
        onDismissError={clearError}
      />
    </div>
  );
}
