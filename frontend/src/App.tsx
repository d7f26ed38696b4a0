import { ConfigProvider } from 'antd';
import enUS from 'antd/locale/en_US';
import { BrowserRouter, Routes, Route, Navigate } from 'react-router-dom';
import { Suspense, lazy } from 'react';
import { darkThemeConfig } from '@/theme';
import { Layout } from '@/components/Layout';

// lazy-loaded routes
const Welcome = lazy(() => import('@/pages/Welcome'));
const TextToImage = lazy(() => import('@/pages/TextToImage'));
const ConditionedImage = lazy(() => import('@/pages/ConditionedImage'));
const RemoveBg = lazy(() => import('@/pages/RemoveBg'));
const Inpainting = lazy(() => import('@/pages/Inpainting'));
const Outpainting = lazy(() => import('@/pages/Outpainting'));

function App() {
  return (
    <ConfigProvider theme={darkThemeConfig} locale={enUS}>
      <BrowserRouter>
        <Suspense fallback={null}>
          <Routes>
            <Route element={<Layout />}>
              <Route path="/" element={<Welcome />} />
              <Route path="/text-to-image" element={<TextToImage />} />
              <Route path="/text-to-image-condition" element={<ConditionedImage />} />
              <Route path="/remove-background" element={<RemoveBg />} />
              <Route path="/inpainting" element={<Inpainting />} />
              <Route path="/outpainting" element={<Outpainting />} />
              <Route path="*" element={<Navigate to="/" replace />} />
            </Route>
          </Routes>
        </Suspense>
      </BrowserRouter>
    </ConfigProvider>
  );
}

export default App;
