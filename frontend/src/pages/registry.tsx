import type { ReactNode } from 'react';
import {
  HomeOutlined,
  FontSizeOutlined,
  BorderInnerOutlined,
  ScissorOutlined,
  HighlightOutlined,
  ExpandOutlined,
} from '@ant-design/icons';

export interface PageEntry {
  path: string;
  title: string;
  icon: ReactNode;
  /** One line for the welcome page */
  summary: string;
}

export const WELCOME_PAGE: PageEntry = {
  path: '/',
  title: 'Welcome',
  icon: <HomeOutlined />,
  summary: 'Overview of the available tools',
};

/** Navigation order of the tools */
export const TOOL_PAGES: PageEntry[] = [
  {
    path: '/text-to-image',
    title: 'Text to Image',
    icon: <FontSizeOutlined />,
    summary: 'Convert text descriptions into images',
  },
  {
    path: '/text-to-image-condition',
    title: 'Text to Image with Condition',
    icon: <BorderInnerOutlined />,
    summary: 'Generate images guided by the edges or segmentation of a reference image',
  },
  {
    path: '/remove-background',
    title: 'Remove Image Background',
    icon: <ScissorOutlined />,
    summary: 'Automatically remove image backgrounds',
  },
  {
    path: '/inpainting',
    title: 'Image Inpainting',
    icon: <HighlightOutlined />,
    summary: 'Fill in masked parts of images',
  },
  {
    path: '/outpainting',
    title: 'Image Outpainting',
    icon: <ExpandOutlined />,
    summary: 'Extend images beyond their original boundaries',
  },
];
